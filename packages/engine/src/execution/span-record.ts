import {
  ProviderExhaustedError,
  isAgentmdError,
  type CostBreakdown,
  type SpanRecord,
  type TokenUsage,
} from "@agentmd/types";

export interface SpanInput {
  agent: string;
  startedAt: number;
  finishedAt: number;
  requestedModel: string | null;
  response?: {
    model: string;
    usage: TokenUsage;
    cost: CostBreakdown;
    attempts: readonly unknown[];
  };
  error?: unknown;
}

export const errorCodeOf = (error: unknown): string => {
  if (isAgentmdError(error)) {
    return error.code;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return "aborted";
  }
  return "unexpected";
};

const attemptsOf = (input: SpanInput): number => {
  if (input.response) {
    return input.response.attempts.length;
  }
  if (input.error instanceof ProviderExhaustedError) {
    return input.error.attempts.length;
  }
  return 0;
};

export const buildSpanRecord = (input: SpanInput): SpanRecord => {
  const durationMs = Math.max(0, input.finishedAt - input.startedAt);
  const usage = input.response?.usage;
  const cost = input.response?.cost;
  const totalTokens = usage?.totalTokens ?? 0;

  const span: SpanRecord = {
    agent: input.agent,
    status: input.error === undefined ? "success" : "failure",
    requestedModel: input.requestedModel,
    model: input.response?.model ?? null,
    startedAt: new Date(input.startedAt).toISOString(),
    finishedAt: new Date(input.finishedAt).toISOString(),
    durationMs,
    inputTokens: usage?.inputTokens ?? 0,
    outputTokens: usage?.outputTokens ?? 0,
    totalTokens,
    tokensPerSecond: durationMs > 0 ? totalTokens / (durationMs / 1000) : 0,
    inputCostUsd: cost?.inputUsd ?? 0,
    outputCostUsd: cost?.outputUsd ?? 0,
    costUsd: cost?.totalUsd ?? 0,
    attempts: attemptsOf(input),
  };

  if (input.error !== undefined) {
    span.errorCode = errorCodeOf(input.error);
    span.errorMessage =
      input.error instanceof Error ? input.error.message : String(input.error);
  }
  return span;
};
