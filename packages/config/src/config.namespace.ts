import { registerAs } from "@nestjs/config";
import { DEFAULT_CONFIG } from "./defaults";
import type { AgentmdConfig } from "./types";

export const CONFIG_NAMESPACE = "agentmd" as const;

export const agentmdConfig = registerAs(
  CONFIG_NAMESPACE,
  (): AgentmdConfig => structuredClone(DEFAULT_CONFIG)
);
