import { Inject, Injectable } from "@nestjs/common";
import { ConfigStore } from "@agentmd/config";
import { DefinitionCatalogService, type CatalogEntry } from "@agentmd/definitions";
import { formatTable, truncate } from "../format-table";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

@Injectable()
export class ListCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "list",
    description: "List the agents found in the agent directories.",
    usage: "list",
    aliases: ["ls"],
  };

  constructor(
    @Inject(DefinitionCatalogService)
    private readonly catalog: DefinitionCatalogService,
    @Inject(ConfigStore) private readonly configStore: ConfigStore,
  ) {}

  async execute(): Promise<number> {
    const { agents, router } = this.configStore.getSnapshot();
    const entries = await this.catalog.list();
    if (entries.length === 0) {
      console.log(`No agents found in ${agents.directories.join(", ")}.`);
      return 0;
    }

    const rows = entries.map((entry) => this.toRow(entry, router.defaultModel));
    console.log(formatTable(["Name", "Model", "Version", "Description"], rows));
    return 0;
  }

  private toRow(entry: CatalogEntry, defaultModel: string | undefined): string[] {
    const { definition } = entry;
    if (!definition) {
      const message = entry.error?.message ?? "unreadable";
      return [entry.id, "N/A", "N/A", `Error: ${truncate(message, 40)}`];
    }
    const model =
      definition.modelId ?? (defaultModel ? `${defaultModel} (default)` : "-");
    return [
      definition.name,
      model,
      `v${definition.latestVersion}`,
      truncate(definition.description, 60),
    ];
  }
}
