import type { FactoryProvider } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { ConfigService } from "./config.service";
import { MODULE_OPTIONS_TOKEN, INITIAL_CONFIG_TOKEN } from "./config.const";
import { agentmdConfig } from "./config.namespace";
import type { AgentmdConfig, CliRuntimeOptions } from "./types";
import { resolveRuntimeOptions } from "./runtime-env";

export const initialConfigProvider: FactoryProvider<AgentmdConfig> = {
  provide: INITIAL_CONFIG_TOKEN,
  inject: [
    { token: MODULE_OPTIONS_TOKEN, optional: true },
    { token: agentmdConfig.KEY, optional: true },
  ],
  useFactory: (
    moduleOptions?: CliRuntimeOptions,
    defaults?: ConfigType<typeof agentmdConfig>,
  ): AgentmdConfig => {
    const service = new ConfigService(
      undefined,
      resolveRuntimeOptions(moduleOptions),
      defaults,
    );

    return service.compose({});
  },
};
