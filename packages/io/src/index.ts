export * from "./io.module";
export * from "./jsonl-writer.service";
export * from "./logger.decorator";
export * from "./logger.service";
