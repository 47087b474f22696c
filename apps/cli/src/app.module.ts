import {
  ConfigurableModuleBuilder,
  Module,
  type DynamicModule,
} from "@nestjs/common";
import { ConfigModule, type CliRuntimeOptions } from "@agentmd/config";
import { IoModule } from "@agentmd/io";
import { CliModule } from "./cli/cli.module";

export type AppModuleOptions = CliRuntimeOptions;

const { ConfigurableModuleClass } =
  new ConfigurableModuleBuilder<AppModuleOptions>({
    moduleName: "AgentmdCliModule",
  }).build();

const appendConfigImport = <T extends { imports?: DynamicModule["imports"] }>(
  dynamicModule: T,
  configImport: DynamicModule,
) => ({
  ...dynamicModule,
  imports: [...(dynamicModule.imports ?? []), configImport],
});

@Module({
  imports: [IoModule, CliModule],
})
export class AppModule extends ConfigurableModuleClass {
  static forRoot(
    options: AppModuleOptions = {},
  ): ReturnType<typeof ConfigurableModuleClass["register"]> {
    return appendConfigImport(super.register(options), ConfigModule.register(options));
  }
}
