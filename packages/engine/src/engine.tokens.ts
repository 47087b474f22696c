export const SPAN_SINK = Symbol("ENGINE_SPAN_SINK");
export const SPAN_TRACER_PROVIDER = Symbol("ENGINE_SPAN_TRACER_PROVIDER");
