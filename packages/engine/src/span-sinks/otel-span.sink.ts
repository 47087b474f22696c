import {
  SpanStatusCode,
  trace,
  type Attributes,
  type Tracer,
  type TracerProvider,
} from "@opentelemetry/api";
import type { SpanRecord, SpanSink } from "@agentmd/types";

const DEFAULT_TRACER_NAME = "agentmd";

export interface OtelSpanSinkOptions {
  tracer?: Tracer;
  tracerProvider?: TracerProvider;
  tracerName?: string;
  tracerVersion?: string;
}

export const toSpanAttributes = (span: SpanRecord): Attributes => {
  const attributes: Attributes = {
    "agent.name": span.agent,
    "execution.status": span.status,
    "execution.attempts": span.attempts,
    "usage.input_tokens": span.inputTokens,
    "usage.output_tokens": span.outputTokens,
    "usage.total_tokens": span.totalTokens,
    "usage.duration_ms": span.durationMs,
    "usage.tokens_per_second": span.tokensPerSecond,
    "cost.input_usd": span.inputCostUsd,
    "cost.output_usd": span.outputCostUsd,
    "cost.total_usd": span.costUsd,
  };
  if (span.requestedModel !== null) {
    attributes["model.requested"] = span.requestedModel;
  }
  if (span.model !== null) {
    attributes["model.name"] = span.model;
  }
  if (span.errorCode !== undefined) {
    attributes["error.code"] = span.errorCode;
  }
  return attributes;
};

/**
 * Emits each execution as an OpenTelemetry span through the globally
 * registered tracer provider unless one is supplied.
 */
export class OtelSpanSink implements SpanSink {
  private readonly tracer: Tracer;

  constructor(options: OtelSpanSinkOptions = {}) {
    const provider = options.tracerProvider ?? trace;
    this.tracer =
      options.tracer ??
      provider.getTracer(options.tracerName ?? DEFAULT_TRACER_NAME, options.tracerVersion);
  }

  record(span: SpanRecord): void {
    const otelSpan = this.tracer.startSpan(`${span.agent} query`, {
      startTime: new Date(span.startedAt),
      attributes: toSpanAttributes(span),
    });
    otelSpan.setStatus(
      span.status === "success"
        ? { code: SpanStatusCode.OK }
        : { code: SpanStatusCode.ERROR, message: span.errorMessage },
    );
    otelSpan.end(new Date(span.finishedAt));
  }
}
