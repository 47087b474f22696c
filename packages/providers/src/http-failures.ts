import type { Response } from "undici";
import {
  ProviderFatalError,
  ProviderTransientError,
  type ProviderFatalReason,
} from "@agentmd/types";

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);
const SCHEMA_REJECTION = /response_format|json_schema|schema/i;

export const isTransientStatus = (status: number): boolean =>
  TRANSIENT_STATUSES.has(status) || status >= 500;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const extractDetail = (body: string): string => {
  const trimmed = body.trim();
  if (!trimmed) {
    return "";
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === "object" && parsed !== null && "error" in parsed) {
      const { error } = parsed;
      if (typeof error === "string") {
        return error;
      }
      if (typeof error === "object" && error !== null && "message" in error) {
        return String(error.message);
      }
    }
  } catch {
    // Plain-text error bodies are reported as they are.
  }
  return trimmed.slice(0, 500);
};

/**
 * Maps a non-2xx response to the provider error taxonomy: throttling,
 * conflicts and server errors are transient, every other 4xx is fatal.
 */
export const classifyHttpFailure = async (
  adapter: string,
  response: Response,
  options: { structured: boolean },
): Promise<ProviderTransientError | ProviderFatalError> => {
  const detail = extractDetail(await response.text().catch(() => ""));
  const message = `${adapter} request failed with ${response.status}${
    detail ? `: ${detail}` : ""
  }`;

  if (isTransientStatus(response.status)) {
    return new ProviderTransientError(message, response.status);
  }

  let reason: ProviderFatalReason = "bad_request";
  if (response.status === 401 || response.status === 403) {
    reason = "authentication";
  } else if (
    options.structured &&
    (response.status === 400 || response.status === 422) &&
    SCHEMA_REJECTION.test(detail)
  ) {
    reason = "unsupported_schema";
  }
  return new ProviderFatalError(message, reason, response.status);
};

/**
 * Wraps a failure to reach the upstream service. Aborts are re-thrown as they
 * are so callers can tell a deadline from a network fault.
 */
export const toNetworkFailure = (
  adapter: string,
  error: unknown,
  signal: AbortSignal | undefined,
): unknown => {
  if (signal?.aborted) {
    return error;
  }
  return new ProviderTransientError(
    `${adapter} request could not be sent: ${describeError(error)}`,
    undefined,
    { cause: error },
  );
};

export const readJsonBody = async (
  adapter: string,
  response: Response,
): Promise<unknown> => {
  const text = await response.text();
  if (!text.trim()) {
    throw new ProviderTransientError(`${adapter} returned an empty body`, response.status);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ProviderTransientError(
      `${adapter} returned a body that is not JSON`,
      response.status,
      { cause: error },
    );
  }
};
