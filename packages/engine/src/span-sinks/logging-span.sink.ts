import type { Logger } from "pino";
import type { SpanRecord, SpanSink } from "@agentmd/types";

export type LoggingSpanSinkLevel = "debug" | "info";

export interface LoggingSpanSinkOptions {
  logger: Pick<Logger, LoggingSpanSinkLevel | "warn">;
  level?: LoggingSpanSinkLevel;
}

/** Writes each span as one structured log line; failures log at `warn`. */
export class LoggingSpanSink implements SpanSink {
  private readonly logger: LoggingSpanSinkOptions["logger"];
  private readonly level: LoggingSpanSinkLevel;

  constructor(options: LoggingSpanSinkOptions) {
    this.logger = options.logger;
    this.level = options.level ?? "info";
  }

  record(span: SpanRecord): void {
    if (span.status === "failure") {
      this.logger.warn({ span }, `${span.agent} execution failed`);
      return;
    }
    this.logger[this.level]({ span }, `${span.agent} execution completed`);
  }
}
