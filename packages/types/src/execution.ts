import type { RenderedPrompt } from "./definitions";
import type { CostBreakdown, ProviderAttempt, TokenUsage } from "./providers";

export interface ExecutionResult<TOutput = unknown> {
  readonly agent: string;
  readonly output: TOutput;
  readonly rawOutput: string;
  readonly usage: TokenUsage;
  readonly cost: CostBreakdown;
  readonly durationMs: number;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly model: string;
  readonly requestedModel: string;
  readonly attempts: readonly ProviderAttempt[];
  readonly prompt: RenderedPrompt;
}

export type SpanStatus = "success" | "failure";

export interface SpanRecord {
  agent: string;
  status: SpanStatus;
  requestedModel: string | null;
  model: string | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  tokensPerSecond: number;
  inputCostUsd: number;
  outputCostUsd: number;
  costUsd: number;
  attempts: number;
  errorCode?: string;
  errorMessage?: string;
}

export interface SpanSink {
  record(span: SpanRecord): void | Promise<void>;
}
