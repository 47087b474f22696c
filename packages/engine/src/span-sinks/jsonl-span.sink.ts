import type { JsonlWriterService } from "@agentmd/io";
import type { SpanRecord, SpanSink } from "@agentmd/types";

export const SPAN_EVENT_TYPE = "agent_execution";

/** Appends spans to a JSONL trace file. */
export class JsonlSpanSink implements SpanSink {
  constructor(
    private readonly writer: Pick<JsonlWriterService, "append">,
    private readonly filePath: string,
  ) {}

  record(span: SpanRecord): Promise<void> {
    return this.writer.append(this.filePath, { type: SPAN_EVENT_TYPE, ...span });
  }
}
