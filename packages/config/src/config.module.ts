import { Global, Module } from "@nestjs/common";
import { ConfigModule as NestConfigModule } from "@nestjs/config";
import { agentmdConfig } from "./config.namespace";
import { ConfigService } from "./config.service";
import { ConfigStore } from "./config.store";
import { initialConfigProvider } from "./initial-config.provider";
import type { CliRuntimeOptions } from "./types";
import { ConfigurableModuleClass, MODULE_OPTIONS_TOKEN } from "./config.const";
import { ConfigValidator } from "./validation/config-validator";

@Global()
@Module({
  imports: [NestConfigModule.forFeature(agentmdConfig)],
  providers: [
    ConfigService,
    initialConfigProvider,
    ConfigStore,
    ConfigValidator,
  ],
  exports: [ConfigService, ConfigStore, ConfigValidator, NestConfigModule],
})
export class ConfigModule extends ConfigurableModuleClass {
  static register(
    options: CliRuntimeOptions,
  ): ReturnType<typeof ConfigurableModuleClass["register"]> {
    const dynamicModule = super.register(options);
    return {
      ...dynamicModule,
      exports: [...(dynamicModule.exports ?? []), MODULE_OPTIONS_TOKEN],
      global: true,
    };
  }
}
