export type LogLevel =
  | "silent"
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace";

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

export type ProviderAdapterName = "openai_compatible" | "anthropic" | "noop";

export interface ProviderConnectionConfig {
  name: string;
  adapter: ProviderAdapterName;
  baseUrl?: string;
  apiKey?: string;
  /** Environment variable consulted when `apiKey` is not set. */
  apiKeyEnv?: string;
  headers?: Record<string, string>;
  /** Sent as `X-Title` by OpenAI-compatible routers. */
  appName?: string;
  /** Sent as `HTTP-Referer` by OpenAI-compatible routers. */
  referer?: string;
  anthropicVersion?: string;
}

export interface ModelPricingConfig {
  inputPerMillion: number;
  outputPerMillion: number;
}

export interface ModelConfig {
  id: string;
  provider: string;
  label?: string;
  pricing: ModelPricingConfig;
  fallbacks?: string[];
  structuredOutput?: boolean;
  promptCaching?: boolean;
  contextWindow?: number;
  maxOutputTokens?: number;
}

export interface ProvidersConfig {
  connections: ProviderConnectionConfig[];
  models: ModelConfig[];
}

export interface RouterConfig {
  attemptsPerModel: number;
  baseDelayMs: number;
  maxDelayMs: number;
  defaultModel?: string;
}

export interface ExecutionConfig {
  /** Deadline for a whole execution; `0` disables it. */
  timeoutMs: number;
}

export interface AgentsConfig {
  directories: string[];
  fragments: string[];
}

export type SpanSinkName = "logging" | "jsonl" | "otel" | "usage";

export interface ObservabilityConfig {
  sinks: SpanSinkName[];
  jsonlPath?: string;
  tracerName?: string;
}

export interface AgentmdConfig {
  version: number;
  logging: LoggingConfig;
  agents: AgentsConfig;
  providers: ProvidersConfig;
  router: RouterConfig;
  execution: ExecutionConfig;
  observability: ObservabilityConfig;
}

export interface AgentmdConfigInput {
  version?: number;
  logging?: Partial<LoggingConfig>;
  agents?: Partial<AgentsConfig>;
  providers?: Partial<ProvidersConfig>;
  router?: Partial<RouterConfig>;
  execution?: Partial<ExecutionConfig>;
  observability?: Partial<ObservabilityConfig>;
}

export interface CliRuntimeOptions {
  config?: string;
  logLevel?: LogLevel;
  logFile?: string;
  model?: string;
  agentsDir?: string[];
  fragmentsDir?: string[];
  timeoutMs?: number;
  jsonlTrace?: string;
}
