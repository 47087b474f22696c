import { Inject, Injectable } from "@nestjs/common";
import { ConfigStore } from "@agentmd/config";
import { DefinitionCatalogService } from "@agentmd/definitions";
import { ExecutionOrchestratorService } from "@agentmd/engine";
import { FragmentRegistryLoader } from "@agentmd/templates";
import type { ExecutionResult } from "@agentmd/types";
import type { CliArguments } from "../cli-arguments";
import { CliOptionsService } from "../cli-options.service";
import { CliParseError } from "../cli-parser.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

export const formatUsage = (result: ExecutionResult): string =>
  [
    "Usage:",
    `  Model: ${result.model}`,
    `  Input tokens: ${result.usage.inputTokens}`,
    `  Output tokens: ${result.usage.outputTokens}`,
    `  Cost: $${result.cost.totalUsd.toFixed(4)}`,
    `  Duration: ${result.durationMs}ms`,
  ].join("\n");

@Injectable()
export class RunCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "run",
    description: "Execute an agent and print its output, usage and cost.",
    usage:
      "run <name> --query <text> [--context <json>] [--model <id>] [--temperature <n>] [--timeout <ms>]",
  };

  constructor(
    @Inject(DefinitionCatalogService)
    private readonly catalog: DefinitionCatalogService,
    @Inject(ExecutionOrchestratorService)
    private readonly orchestrator: ExecutionOrchestratorService,
    @Inject(FragmentRegistryLoader)
    private readonly fragmentLoader: FragmentRegistryLoader,
    @Inject(ConfigStore) private readonly configStore: ConfigStore,
    @Inject(CliOptionsService) private readonly optionsService: CliOptionsService,
  ) {}

  async execute(args: CliArguments): Promise<number> {
    const name = args.positionals[0];
    if (!name) {
      throw new CliParseError("The run command requires an agent name.");
    }
    const query = this.optionsService.string(args.options, "query");
    if (!query) {
      throw new CliParseError("The run command requires --query.");
    }

    const context = { query, ...this.optionsService.context(args.options) };
    const options = {
      model: this.optionsService.string(args.options, "model"),
      temperature: this.optionsService.number(args.options, "temperature"),
      timeoutMs: this.optionsService.number(args.options, "timeoutMs"),
    };
    const definition = await this.catalog.get(name);
    const fragments = await this.fragmentLoader.loadDirectories(
      this.configStore.section("agents").fragments,
    );
    const result = await this.orchestrator.execute(definition, context, {
      ...options,
      fragments,
    });

    console.log(
      typeof result.output === "string"
        ? result.output
        : JSON.stringify(result.output, null, 2),
    );
    console.error(formatUsage(result));
    return 0;
  }
}
