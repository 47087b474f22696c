import { Inject, Injectable } from "@nestjs/common";
import { ConfigStore } from "@agentmd/config";
import { DefinitionCatalogService, explainDefinition } from "@agentmd/definitions";
import { SchemaCompilerService } from "@agentmd/schemas";
import { SchemaCompilationError, type AgentDefinition } from "@agentmd/types";
import type { CliArguments } from "../cli-arguments";
import { CliParseError } from "../cli-parser.service";
import { truncate } from "../format-table";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

export const SYSTEM_PROMPT_PREVIEW_LENGTH = 200;

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

@Injectable()
export class ExplainCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "explain",
    description: "Show an agent's configuration, prompt preview and output schema.",
    usage: "explain <name>",
  };

  constructor(
    @Inject(DefinitionCatalogService)
    private readonly catalog: DefinitionCatalogService,
    @Inject(SchemaCompilerService) private readonly schemas: SchemaCompilerService,
    @Inject(ConfigStore) private readonly configStore: ConfigStore,
  ) {}

  async execute(args: CliArguments): Promise<number> {
    const name = args.positionals[0];
    if (!name) {
      throw new CliParseError("The explain command requires an agent name.");
    }

    const definition = await this.catalog.get(name);
    const lines = [explainDefinition(definition), "", "Configuration:"];
    lines.push(...this.describeConfiguration(definition));

    if (definition.systemPromptTemplate) {
      lines.push(
        "",
        "System prompt (preview):",
        truncate(definition.systemPromptTemplate, SYSTEM_PROMPT_PREVIEW_LENGTH),
      );
    }

    let exitCode = 0;
    if (definition.outputSchemaSource) {
      lines.push("", "Output schema:");
      try {
        const handle = this.schemas.compile(
          definition.outputSchemaSource.source,
          definition.outputSchemaSource.format,
        );
        lines.push(JSON.stringify(handle.jsonSchema, null, 2));
      } catch (error) {
        if (!(error instanceof SchemaCompilationError)) {
          throw error;
        }
        lines.push(error.message);
        exitCode = 1;
      }
    }

    console.log(lines.join("\n"));
    return exitCode;
  }

  private describeConfiguration(definition: AgentDefinition): string[] {
    const { defaultModel } = this.configStore.section("router");
    const model =
      definition.modelId ?? (defaultModel ? `${defaultModel} (default)` : "-");
    const lines = [
      `  Model: ${model}`,
      `  Temperature: ${definition.temperature}`,
      `  Version: v${definition.latestVersion}`,
    ];

    const { purpose, capabilities } = definition.metadata;
    if (typeof purpose === "string") {
      lines.push(`  Purpose: ${truncate(purpose, 60)}`);
    }
    if (isStringList(capabilities)) {
      lines.push(`  Capabilities: ${capabilities.join(", ")}`);
    }
    return lines;
  }
}
