import type { Logger } from "pino";
import type { SpanRecord, SpanSink } from "@agentmd/types";

/**
 * Fans a span out to several sinks. A sink that throws is logged and does
 * not keep the span from the others.
 */
export class CompositeSpanSink implements SpanSink {
  constructor(
    readonly sinks: readonly SpanSink[],
    private readonly logger: Pick<Logger, "error">,
  ) {}

  async record(span: SpanRecord): Promise<void> {
    const outcomes = await Promise.allSettled(
      this.sinks.map(async (sink) => sink.record(span)),
    );
    outcomes.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        this.logger.error(
          { err: outcome.reason, sink: this.sinks[index]?.constructor.name, agent: span.agent },
          "Span sink failed",
        );
      }
    });
  }
}

export const NOOP_SPAN_SINK: SpanSink = {
  record: () => undefined,
};
