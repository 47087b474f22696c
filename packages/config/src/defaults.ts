import type { AgentmdConfig } from "./types";
import { CURRENT_CONFIG_VERSION } from "./migrations";

export const DEFAULT_CONFIG: AgentmdConfig = {
  version: CURRENT_CONFIG_VERSION,
  logging: {
    level: "info",
    destination: {
      type: "stderr",
      pretty: false,
    },
    enableTimestamps: true,
  },
  agents: {
    directories: ["agents"],
    fragments: [],
  },
  providers: {
    connections: [
      {
        name: "openrouter",
        adapter: "openai_compatible",
        baseUrl: "https://openrouter.ai/api/v1",
        apiKeyEnv: "OPENROUTER_API_KEY",
        appName: "agentmd",
      },
    ],
    models: [
      {
        id: "anthropic/claude-opus-4.1",
        provider: "openrouter",
        label: "Claude Opus 4.1",
        pricing: { inputPerMillion: 15, outputPerMillion: 75 },
        fallbacks: ["openai/o1-pro", "anthropic/claude-sonnet-4.5"],
        structuredOutput: true,
        promptCaching: true,
        contextWindow: 200_000,
        maxOutputTokens: 32_000,
      },
      {
        id: "anthropic/claude-sonnet-4.5",
        provider: "openrouter",
        label: "Claude Sonnet 4.5",
        pricing: { inputPerMillion: 3, outputPerMillion: 15 },
        fallbacks: ["anthropic/claude-3.5-haiku", "openai/gpt-5"],
        structuredOutput: true,
        promptCaching: true,
        contextWindow: 200_000,
        maxOutputTokens: 64_000,
      },
      {
        id: "anthropic/claude-3.5-haiku",
        provider: "openrouter",
        label: "Claude 3.5 Haiku",
        pricing: { inputPerMillion: 1, outputPerMillion: 5 },
        fallbacks: ["openai/gpt-5-mini"],
        structuredOutput: true,
        promptCaching: true,
        contextWindow: 200_000,
        maxOutputTokens: 8_192,
      },
      {
        id: "openai/gpt-5",
        provider: "openrouter",
        label: "GPT-5",
        pricing: { inputPerMillion: 1.25, outputPerMillion: 10 },
        fallbacks: ["anthropic/claude-sonnet-4.5", "openai/gpt-5-mini"],
        structuredOutput: true,
        contextWindow: 400_000,
        maxOutputTokens: 16_384,
      },
      {
        id: "openai/gpt-5-mini",
        provider: "openrouter",
        label: "GPT-5 Mini",
        pricing: { inputPerMillion: 0.15, outputPerMillion: 0.6 },
        fallbacks: ["anthropic/claude-3.5-haiku"],
        structuredOutput: true,
        contextWindow: 128_000,
        maxOutputTokens: 16_384,
      },
      {
        id: "openai/o1-pro",
        provider: "openrouter",
        label: "O1 Pro",
        pricing: { inputPerMillion: 15, outputPerMillion: 60 },
        fallbacks: ["anthropic/claude-opus-4.1"],
        contextWindow: 128_000,
        maxOutputTokens: 100_000,
      },
    ],
  },
  router: {
    attemptsPerModel: 3,
    baseDelayMs: 500,
    maxDelayMs: 8_000,
    defaultModel: "anthropic/claude-sonnet-4.5",
  },
  execution: {
    timeoutMs: 120_000,
  },
  observability: {
    sinks: ["logging", "usage"],
    jsonlPath: ".agentmd/spans.jsonl",
    tracerName: "agentmd",
  },
};
