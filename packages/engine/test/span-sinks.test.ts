import type { Logger } from "pino";
import { describe, expect, it, vi } from "vitest";
import type { Tracer } from "@opentelemetry/api";
import { DEFAULT_CONFIG, type ObservabilityConfig } from "@agentmd/config";
import type { SpanRecord, SpanSink } from "@agentmd/types";
import { CompositeSpanSink, NOOP_SPAN_SINK } from "../src/span-sinks/composite-span.sink";
import { JsonlSpanSink, SPAN_EVENT_TYPE } from "../src/span-sinks/jsonl-span.sink";
import { LoggingSpanSink } from "../src/span-sinks/logging-span.sink";
import { OtelSpanSink, toSpanAttributes } from "../src/span-sinks/otel-span.sink";
import {
  ConfiguredSpanSink,
  createSpanSink,
  type SpanSinkDependencies,
} from "../src/span-sinks/span-sink.providers";
import { UsageSummarySink } from "../src/span-sinks/usage-summary.sink";

const createSpan = (overrides: Partial<SpanRecord> = {}): SpanRecord => ({
  agent: "reviewer",
  status: "success",
  requestedModel: "alpha",
  model: "alpha",
  startedAt: "2025-01-01T00:00:00.000Z",
  finishedAt: "2025-01-01T00:00:02.000Z",
  durationMs: 2000,
  inputTokens: 1000,
  outputTokens: 500,
  totalTokens: 1500,
  tokensPerSecond: 750,
  inputCostUsd: 0.002,
  outputCostUsd: 0.005,
  costUsd: 0.25,
  attempts: 1,
  ...overrides,
});

const createLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const createDeps = () => {
  const logger = createLogger();
  const deps: SpanSinkDependencies = {
    logger: logger as unknown as Logger,
    writer: { append: vi.fn(async () => undefined) },
    usage: new UsageSummarySink(),
  };
  return { deps, logger };
};

describe("LoggingSpanSink", () => {
  it("logs successes at the configured level and failures as warnings", () => {
    const logger = createLogger();
    const sink = new LoggingSpanSink({ logger: logger as unknown as Logger, level: "debug" });
    const success = createSpan();
    const failure = createSpan({ status: "failure", errorCode: "timeout" });

    sink.record(success);
    sink.record(failure);

    expect(logger.debug).toHaveBeenCalledWith({ span: success }, "reviewer execution completed");
    expect(logger.warn).toHaveBeenCalledWith({ span: failure }, "reviewer execution failed");
    expect(logger.info).not.toHaveBeenCalled();
  });
});

describe("JsonlSpanSink", () => {
  it("appends the span as a typed event", async () => {
    const append = vi.fn(async () => undefined);
    const span = createSpan();

    await new JsonlSpanSink({ append }, "/tmp/spans.jsonl").record(span);

    expect(append).toHaveBeenCalledWith("/tmp/spans.jsonl", { type: SPAN_EVENT_TYPE, ...span });
  });
});

describe("OtelSpanSink", () => {
  it("starts and ends a span with the execution timing and status", () => {
    const otelSpan = { setStatus: vi.fn(), end: vi.fn() };
    const startSpan = vi.fn(() => otelSpan);
    const tracer = { startSpan } as unknown as Tracer;
    const span = createSpan({ status: "failure", errorCode: "timeout", errorMessage: "late" });

    new OtelSpanSink({ tracer }).record(span);

    expect(startSpan).toHaveBeenCalledWith("reviewer query", {
      startTime: new Date("2025-01-01T00:00:00.000Z"),
      attributes: toSpanAttributes(span),
    });
    expect(otelSpan.setStatus).toHaveBeenCalledWith({ code: 2, message: "late" });
    expect(otelSpan.end).toHaveBeenCalledWith(new Date("2025-01-01T00:00:02.000Z"));
  });

  it("omits attributes that have no value", () => {
    const attributes = toSpanAttributes(createSpan({ model: null, requestedModel: null }));

    expect(attributes["model.name"]).toBeUndefined();
    expect(attributes["model.requested"]).toBeUndefined();
    expect(attributes["error.code"]).toBeUndefined();
    expect(attributes["cost.total_usd"]).toBe(0.25);
  });
});

describe("UsageSummarySink", () => {
  it("accumulates executions, failures, tokens and cost per agent", () => {
    const sink = new UsageSummarySink();
    sink.record(createSpan());
    sink.record(createSpan({ status: "failure", model: null, costUsd: 0.5 }));
    sink.record(createSpan({ agent: "writer", model: "beta" }));

    expect(sink.summary("reviewer")).toEqual({
      agent: "reviewer",
      executions: 2,
      failures: 1,
      inputTokens: 2000,
      outputTokens: 1000,
      totalCostUsd: 0.75,
      averageCostUsd: 0.375,
      lastModel: "alpha",
    });
    expect(sink.list().map((summary) => summary.agent)).toEqual(["reviewer", "writer"]);

    sink.reset();
    expect(sink.summary("reviewer")).toBeUndefined();
  });
});

describe("CompositeSpanSink", () => {
  it("delivers to every sink even when one throws", async () => {
    const logger = createLogger();
    const delivered: SpanRecord[] = [];
    const failing: SpanSink = {
      record: () => {
        throw new Error("boom");
      },
    };
    const collecting: SpanSink = {
      record: (span) => {
        delivered.push(span);
      },
    };

    await new CompositeSpanSink([failing, collecting], logger).record(createSpan());

    expect(delivered).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ agent: "reviewer" }),
      "Span sink failed",
    );
  });
});

describe("createSpanSink", () => {
  const observability = (overrides: Partial<ObservabilityConfig>): ObservabilityConfig => ({
    ...DEFAULT_CONFIG.observability,
    ...overrides,
  });

  it("builds one sink per configured name", () => {
    const { deps } = createDeps();

    const sink = createSpanSink(
      observability({ sinks: ["logging", "jsonl", "otel", "usage", "usage"] }),
      deps,
    );

    expect(sink).toBeInstanceOf(CompositeSpanSink);
    const names =
      sink instanceof CompositeSpanSink
        ? sink.sinks.map((entry) => entry.constructor.name)
        : [];
    expect(names).toEqual(["LoggingSpanSink", "JsonlSpanSink", "OtelSpanSink", "UsageSummarySink"]);
  });

  it("returns a no-op sink when nothing is configured", () => {
    const { deps } = createDeps();

    expect(createSpanSink(observability({ sinks: [] }), deps)).toBe(NOOP_SPAN_SINK);
  });

  it("skips the jsonl sink without a path", () => {
    const { deps, logger } = createDeps();

    const sink = createSpanSink(observability({ sinks: ["jsonl"], jsonlPath: undefined }), deps);

    expect(sink).toBe(NOOP_SPAN_SINK);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe("ConfiguredSpanSink", () => {
  it("rebuilds its sinks when the observability settings change", async () => {
    const { deps } = createDeps();
    let config = DEFAULT_CONFIG.observability;
    const sink = new ConfiguredSpanSink(() => config, deps);

    await sink.record(createSpan());
    expect(deps.usage.summary("reviewer")?.executions).toBe(1);

    config = { ...config, sinks: ["jsonl"], jsonlPath: "/tmp/trace.jsonl" };
    await sink.record(createSpan());

    expect(deps.usage.summary("reviewer")?.executions).toBe(1);
    expect(deps.writer.append).toHaveBeenCalledTimes(1);
  });
});
