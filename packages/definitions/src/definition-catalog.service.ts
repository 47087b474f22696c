import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type { AgentDefinition } from "@agentmd/types";
import { InjectLogger } from "@agentmd/io";
import { DefinitionParserService, hashSource } from "./definition-parser.service";
import type { DefinitionDocument, DocumentSource } from "./document-source";
import { DOCUMENT_SOURCE } from "./definitions.tokens";

interface CachedDefinition {
  hash: string;
  definition: AgentDefinition;
}

export interface CatalogEntry {
  id: string;
  location: string;
  definition?: AgentDefinition;
  error?: Error;
}

/**
 * Parsed definitions keyed by document identifier. A document is parsed again
 * only when its content hash changes.
 */
@Injectable()
export class DefinitionCatalogService {
  private readonly cache = new Map<string, CachedDefinition>();

  constructor(
    @Inject(DefinitionParserService)
    private readonly parser: DefinitionParserService,
    @Inject(DOCUMENT_SOURCE) private readonly source: DocumentSource,
    @InjectLogger("definitions:catalog") private readonly logger: Logger,
  ) {}

  async get(id: string): Promise<AgentDefinition> {
    return this.resolve(await this.source.read(id));
  }

  /**
   * Every document the source lists. A document that cannot be read or
   * parsed becomes an entry carrying its error; the rest are still listed.
   */
  async list(): Promise<CatalogEntry[]> {
    const ids = await this.source.list();
    const entries: CatalogEntry[] = [];
    for (const id of ids) {
      let location = id;
      try {
        const document = await this.source.read(id);
        location = document.location;
        entries.push({ id, location, definition: this.resolve(document) });
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.logger.warn({ agent: id, location, err: failure }, "Skipping unreadable definition");
        entries.push({ id, location, error: failure });
      }
    }
    return entries;
  }

  private resolve(document: DefinitionDocument): AgentDefinition {
    const { id, location, text } = document;
    const hash = hashSource(text);
    const cached = this.cache.get(id);
    if (cached && cached.hash === hash) {
      return cached.definition;
    }

    const definition = this.parser.parse(text, { sourceId: id });
    for (const warning of definition.warnings) {
      this.logger.warn({ agent: id, location }, warning);
    }
    this.cache.set(id, { hash, definition });
    this.logger.debug(
      { agent: id, location, refreshed: Boolean(cached) },
      "Parsed agent definition",
    );
    return definition;
  }

  clear(): void {
    this.cache.clear();
  }
}
