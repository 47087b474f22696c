import type { AgentDefinition } from "@agentmd/types";

/** One-line summary, e.g. `reviewer (v3): Reviews pull requests`. */
export const explainDefinition = (definition: AgentDefinition): string => {
  const version = definition.latestVersion > 1 ? ` (v${definition.latestVersion})` : "";
  const description = definition.description || "No description provided";
  return `${definition.name}${version}: ${description}`;
};
