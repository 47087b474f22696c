import { Injectable } from "@nestjs/common";
import fg from "fast-glob";
import fs from "fs/promises";
import path from "path";
import type { Logger } from "pino";
import { InjectLogger } from "@agentmd/io";

export const FRAGMENT_FILE_GLOB = "**/*.{njk,j2,jinja,jinja2,md,txt}";

/**
 * Builds fragment registries from directories on disk. Each fragment is
 * registered under its path relative to the directory and, when unambiguous,
 * under the same path without its extension.
 */
@Injectable()
export class FragmentRegistryLoader {
  constructor(
    @InjectLogger("templates:fragments") private readonly logger: Logger,
  ) {}

  async loadDirectories(
    directories: readonly string[],
  ): Promise<ReadonlyMap<string, string>> {
    const registry = new Map<string, string>();
    const aliases = new Map<string, string>();

    for (const directory of directories) {
      const root = path.resolve(directory);
      const files = await fg(FRAGMENT_FILE_GLOB, {
        cwd: root,
        onlyFiles: true,
        dot: false,
      });

      for (const relative of files.sort()) {
        const name = relative.split(path.sep).join("/");
        if (registry.has(name)) {
          this.logger.warn(
            { fragment: name, directory: root },
            "Fragment shadowed by an earlier directory",
          );
          continue;
        }
        registry.set(name, await fs.readFile(path.join(root, relative), "utf-8"));

        const stem = name.slice(0, name.length - path.extname(name).length);
        if (!aliases.has(stem)) {
          aliases.set(stem, name);
        }
      }
    }

    for (const [stem, name] of aliases) {
      const source = registry.get(name);
      if (!registry.has(stem) && source !== undefined) {
        registry.set(stem, source);
      }
    }

    this.logger.debug(
      { directories, fragments: registry.size },
      "Loaded template fragments",
    );
    return registry;
  }
}
