import { Module, type Provider } from "@nestjs/common";
import { DefinitionsModule } from "@agentmd/definitions";
import { EngineModule } from "@agentmd/engine";
import { SchemasModule } from "@agentmd/schemas";
import { CliOptionsService } from "./cli-options.service";
import { CliParserService } from "./cli-parser.service";
import { CliRunnerService } from "./cli-runner.service";
import { CLI_COMMANDS } from "./cli.constants";
import type { CliCommand } from "./commands/cli-command";
import { ExplainCommand } from "./commands/explain.command";
import { ListCommand } from "./commands/list.command";
import { RunCommand } from "./commands/run.command";
import { ValidateCommand } from "./commands/validate.command";

const commandProviders: Provider[] = [
  ListCommand,
  ValidateCommand,
  ExplainCommand,
  RunCommand,
  {
    provide: CLI_COMMANDS,
    useFactory: (
      list: ListCommand,
      validate: ValidateCommand,
      explain: ExplainCommand,
      run: RunCommand,
    ): CliCommand[] => [list, validate, explain, run],
    inject: [ListCommand, ValidateCommand, ExplainCommand, RunCommand],
  },
];

/**
 * CliModule bundles the command surface so commands and supporting services
 * can be injected wherever a Nest application context is available.
 */
@Module({
  imports: [DefinitionsModule, EngineModule, SchemasModule],
  providers: [
    CliOptionsService,
    CliParserService,
    CliRunnerService,
    ...commandProviders,
  ],
  exports: [CliRunnerService],
})
export class CliModule {}
