import type { FactoryProvider, ValueProvider } from "@nestjs/common";
import type { TracerProvider } from "@opentelemetry/api";
import type { Logger } from "pino";
import { ConfigStore, type ObservabilityConfig } from "@agentmd/config";
import { JsonlWriterService, getLoggerToken } from "@agentmd/io";
import type { SpanRecord, SpanSink } from "@agentmd/types";
import { SPAN_SINK, SPAN_TRACER_PROVIDER } from "../engine.tokens";
import { CompositeSpanSink, NOOP_SPAN_SINK } from "./composite-span.sink";
import { JsonlSpanSink } from "./jsonl-span.sink";
import { LoggingSpanSink } from "./logging-span.sink";
import { OtelSpanSink } from "./otel-span.sink";
import { UsageSummarySink } from "./usage-summary.sink";

export const SPAN_LOGGER_SCOPE = "engine:spans";

export interface SpanSinkDependencies {
  logger: Logger;
  writer: Pick<JsonlWriterService, "append">;
  usage: UsageSummarySink;
  tracerProvider?: TracerProvider;
}

export const createSpanSink = (
  config: ObservabilityConfig,
  deps: SpanSinkDependencies,
): SpanSink => {
  const sinks: SpanSink[] = [];
  for (const name of new Set(config.sinks)) {
    switch (name) {
      case "logging":
        sinks.push(new LoggingSpanSink({ logger: deps.logger }));
        break;
      case "jsonl":
        if (!config.jsonlPath) {
          deps.logger.warn("JSONL span sink configured without a jsonlPath; skipping");
          break;
        }
        sinks.push(new JsonlSpanSink(deps.writer, config.jsonlPath));
        break;
      case "otel":
        sinks.push(
          new OtelSpanSink({
            tracerName: config.tracerName,
            tracerProvider: deps.tracerProvider,
          }),
        );
        break;
      case "usage":
        sinks.push(deps.usage);
        break;
    }
  }

  if (sinks.length === 0) {
    return NOOP_SPAN_SINK;
  }
  return new CompositeSpanSink(sinks, deps.logger);
};

/**
 * Sink built from the current observability settings. The underlying sinks
 * are rebuilt when those settings change.
 */
export class ConfiguredSpanSink implements SpanSink {
  private current?: { key: string; sink: SpanSink };

  constructor(
    private readonly config: () => ObservabilityConfig,
    private readonly deps: SpanSinkDependencies,
  ) {}

  record(span: SpanRecord): void | Promise<void> {
    return this.resolve().record(span);
  }

  private resolve(): SpanSink {
    const config = this.config();
    const key = JSON.stringify(config);
    if (this.current?.key !== key) {
      this.current = { key, sink: createSpanSink(config, this.deps) };
    }
    return this.current.sink;
  }
}

const spanSinkProvider: FactoryProvider<SpanSink> = {
  provide: SPAN_SINK,
  useFactory: (
    configStore: ConfigStore,
    logger: Logger,
    writer: JsonlWriterService,
    usage: UsageSummarySink,
    tracerProvider?: TracerProvider,
  ): SpanSink =>
    new ConfiguredSpanSink(() => configStore.section("observability"), {
      logger,
      writer,
      usage,
      tracerProvider,
    }),
  inject: [
    ConfigStore,
    getLoggerToken(SPAN_LOGGER_SCOPE),
    JsonlWriterService,
    UsageSummarySink,
    SPAN_TRACER_PROVIDER,
  ],
};

const spanTracerProvider: ValueProvider<TracerProvider | undefined> = {
  provide: SPAN_TRACER_PROVIDER,
  useValue: undefined,
};

export const spanSinkProviders = [spanSinkProvider, spanTracerProvider, UsageSummarySink];
