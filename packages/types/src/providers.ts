export type Role = "system" | "user" | "assistant";

export interface ChatMessage {
  role: Role;
  content: string;
}

export type JsonSchemaObject = Record<string, unknown>;

export interface ModelPricing {
  /** USD per one million input tokens. */
  inputPerMillion: number;
  /** USD per one million output tokens. */
  outputPerMillion: number;
}

export interface ModelCapabilities {
  structuredOutput: boolean;
  promptCaching: boolean;
}

export interface ProviderDescriptor {
  id: string;
  /** Name of the provider connection that serves this model. */
  provider: string;
  pricing: ModelPricing;
  fallbacks: readonly string[];
  capabilities: ModelCapabilities;
  contextWindow?: number;
  maxOutputTokens?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CostBreakdown {
  inputUsd: number;
  outputUsd: number;
  totalUsd: number;
}

export interface ProviderResponseFormat {
  name: string;
  schema: JsonSchemaObject;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxOutputTokens?: number;
  responseFormat?: ProviderResponseFormat;
  promptCaching?: boolean;
  /** Name of the agent on whose behalf the request is made. */
  agent?: string;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  text: string;
  usage: TokenUsage;
  /** Model reported by the upstream service, when it names one. */
  model?: string;
}

export interface ProviderAdapter {
  readonly name: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export type ProviderAttemptOutcome = "success" | "transient" | "fatal";

export interface ProviderAttempt {
  model: string;
  attempt: number;
  outcome: ProviderAttemptOutcome;
  status?: number;
  message?: string;
}
