import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { CliRuntimeOptions } from "./types";

export const { ConfigurableModuleClass, MODULE_OPTIONS_TOKEN } =
  new ConfigurableModuleBuilder<CliRuntimeOptions>({
    moduleName: "AgentmdConfigModule",
  }).build();

export const INITIAL_CONFIG_TOKEN = Symbol("AGENTMD_INITIAL_CONFIG");
