import fg from "fast-glob";
import fs from "fs/promises";
import path from "path";

export const DEFINITION_FILE_SUFFIX = ".agent.md";

export interface DefinitionDocument {
  id: string;
  text: string;
  /** Where the document came from, for diagnostics. */
  location: string;
}

export interface DocumentSource {
  list(): Promise<string[]>;
  read(id: string): Promise<DefinitionDocument>;
}

export class DefinitionNotFoundError extends Error {
  constructor(readonly id: string) {
    super(`No agent definition named "${id}"`);
    this.name = "DefinitionNotFoundError";
  }
}

export class InMemoryDocumentSource implements DocumentSource {
  private readonly documents: Map<string, string>;

  constructor(documents: Record<string, string> | ReadonlyMap<string, string> = {}) {
    this.documents =
      documents instanceof Map
        ? new Map(documents)
        : new Map(Object.entries(documents));
  }

  set(id: string, text: string): void {
    this.documents.set(id, text);
  }

  async list(): Promise<string[]> {
    return Array.from(this.documents.keys()).sort();
  }

  async read(id: string): Promise<DefinitionDocument> {
    const text = this.documents.get(id);
    if (text === undefined) {
      throw new DefinitionNotFoundError(id);
    }
    return { id, text, location: `memory:${id}` };
  }
}

type DirectoryList = readonly string[] | (() => readonly string[]);

/**
 * Discovers `*.agent.md` files under a set of directories. The identifier of
 * a document is its file name without the suffix; earlier directories win.
 */
export class FileSystemDocumentSource implements DocumentSource {
  constructor(private readonly directories: DirectoryList) {}

  async list(): Promise<string[]> {
    const index = await this.index();
    return Array.from(index.keys()).sort();
  }

  async read(id: string): Promise<DefinitionDocument> {
    const index = await this.index();
    const location = index.get(id);
    if (!location) {
      throw new DefinitionNotFoundError(id);
    }
    return { id, text: await fs.readFile(location, "utf-8"), location };
  }

  private resolveDirectories(): readonly string[] {
    return typeof this.directories === "function"
      ? this.directories()
      : this.directories;
  }

  private async index(): Promise<Map<string, string>> {
    const index = new Map<string, string>();
    for (const directory of this.resolveDirectories()) {
      const root = path.resolve(directory);
      const files = await fg(`**/*${DEFINITION_FILE_SUFFIX}`, {
        cwd: root,
        absolute: true,
        onlyFiles: true,
        suppressErrors: true,
      });
      for (const file of files.sort()) {
        const id = path.basename(file).slice(0, -DEFINITION_FILE_SUFFIX.length);
        if (!index.has(id)) {
          index.set(id, file);
        }
      }
    }
    return index;
  }
}
