import type { ProviderResponseFormat } from "@agentmd/types";

export interface OpenAIResponseFormat {
  type: "json_schema";
  json_schema: {
    name: string;
    schema: Record<string, unknown>;
  };
}

/** Strips draft metadata that chat completion endpoints reject. */
const toWireSchema = (schema: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(schema).filter(([key]) => key !== "$schema"));

export const toOpenAIResponseFormat = (
  format: ProviderResponseFormat,
): OpenAIResponseFormat => ({
  type: "json_schema",
  json_schema: { name: format.name, schema: toWireSchema(format.schema) },
});

/**
 * Instruction appended to the system prompt for endpoints that have no native
 * structured output parameter.
 */
export const describeResponseFormat = (format: ProviderResponseFormat): string =>
  [
    `Respond with a single JSON document for "${format.name}" that conforms to this JSON Schema:`,
    "```json",
    JSON.stringify(toWireSchema(format.schema), null, 2),
    "```",
  ].join("\n");
