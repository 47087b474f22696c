import { Inject, Injectable } from "@nestjs/common";
import { CLI_OPTION_DEFINITIONS, ConfigService } from "@agentmd/config";
import { LoggerService } from "@agentmd/io";
import { CliOptionsService } from "./cli-options.service";
import { CliParseError, CliParserService } from "./cli-parser.service";
import { CLI_COMMANDS } from "./cli.constants";
import type { CliCommand } from "./commands/cli-command";

const HELP_TOKENS = new Set(["help", "--help", "-h"]);

@Injectable()
export class CliRunnerService {
  constructor(
    @Inject(CliParserService) private readonly parser: CliParserService,
    @Inject(CliOptionsService) private readonly optionsService: CliOptionsService,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(LoggerService) private readonly loggerService: LoggerService,
    @Inject(CLI_COMMANDS) private readonly commands: CliCommand[],
  ) {}

  /** Runs one command and resolves with the process exit code. */
  async run(argv: string[]): Promise<number> {
    const [first] = argv;
    if (first === undefined || HELP_TOKENS.has(first)) {
      console.log(this.usage());
      return first === undefined ? 1 : 0;
    }

    const args = this.parser.parse(argv);
    const command = this.findCommand(args.command);
    if (!command) {
      throw new CliParseError(
        `Unknown command: ${args.command}. Run "agentmd help" for the command list.`,
      );
    }
    if (args.options.help === true) {
      console.log(`Usage: agentmd ${command.metadata.usage}\n\n${command.metadata.description}`);
      return 0;
    }

    const config = await this.configService.load(this.optionsService.runtime(args.options));
    this.loggerService.configure(config.logging);
    return command.execute(args);
  }

  usage(): string {
    const commandWidth = Math.max(...this.commands.map((command) => command.metadata.name.length));
    const flags = CLI_OPTION_DEFINITIONS.map((definition) => ({
      label: [definition.flag, ...definition.aliases].join(", "),
      description: definition.description,
    }));
    const flagWidth = Math.max(...flags.map((flag) => flag.label.length));

    return [
      "Usage: agentmd <command> [options]",
      "",
      "Commands:",
      ...this.commands.map(
        (command) =>
          `  ${command.metadata.name.padEnd(commandWidth)}  ${command.metadata.description}`,
      ),
      "",
      "Options:",
      ...flags.map((flag) => `  ${flag.label.padEnd(flagWidth)}  ${flag.description}`),
    ].join("\n");
  }

  private findCommand(name: string): CliCommand | undefined {
    return this.commands.find(
      (command) =>
        command.metadata.name === name || command.metadata.aliases?.includes(name),
    );
  }
}
