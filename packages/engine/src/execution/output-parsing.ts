import { ValidationFailureError } from "@agentmd/types";

const JSON_FENCE = /^```(?:json)?[ \t]*\r?\n([\s\S]*?)\r?\n?```$/i;

/** Removes a Markdown code fence wrapped around the whole response. */
export const stripJsonFence = (text: string): string => {
  const trimmed = text.trim();
  const match = JSON_FENCE.exec(trimmed);
  return match ? (match[1] ?? "").trim() : trimmed;
};

/**
 * Parses a model response as JSON. Text that does not parse is reported as a
 * validation failure at the document root.
 */
export const parseJsonOutput = (text: string, schemaName: string): unknown => {
  const body = stripJsonFence(text);
  try {
    return JSON.parse(body);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationFailureError(schemaName, [
      {
        field: "$",
        code: "unparseable",
        message: `is not valid JSON: ${detail}`,
      },
    ]);
  }
};
