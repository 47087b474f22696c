import type { CostBreakdown, ModelPricing, TokenUsage } from "@agentmd/types";

export const computeCost = (usage: TokenUsage, pricing: ModelPricing): CostBreakdown => {
  const inputUsd = (usage.inputTokens / 1_000_000) * pricing.inputPerMillion;
  const outputUsd = (usage.outputTokens / 1_000_000) * pricing.outputPerMillion;
  return { inputUsd, outputUsd, totalUsd: inputUsd + outputUsd };
};
