export * from "./engine.module";
export * from "./engine.tokens";
export * from "./execution/deadline";
export * from "./execution/execution-orchestrator.service";
export * from "./execution/output-parsing";
export * from "./execution/span-record";
export * from "./prompts/prompt-composer.service";
export * from "./span-sinks/composite-span.sink";
export * from "./span-sinks/jsonl-span.sink";
export * from "./span-sinks/logging-span.sink";
export * from "./span-sinks/otel-span.sink";
export * from "./span-sinks/span-sink.providers";
export * from "./span-sinks/usage-summary.sink";
