export const DOCUMENT_SOURCE = Symbol("AGENTMD_DOCUMENT_SOURCE");
export const MODEL_CATALOG = Symbol("AGENTMD_MODEL_CATALOG");
