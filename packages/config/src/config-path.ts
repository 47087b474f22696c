import fs from "fs/promises";
import path from "path";
import type { CliRuntimeOptions } from "./types";

export const CONFIG_FILENAMES = [
  "agentmd.config.json",
  "agentmd.config.yaml",
  "agentmd.config.yml",
  ".agentmdrc",
  ".agentmdrc.json",
  ".agentmdrc.yaml",
];

export function getConfigRoot(): string {
  const override = process.env.CONFIG_ROOT;
  if (override && override.trim().length > 0) {
    return path.resolve(process.cwd(), override);
  }
  return path.resolve(process.cwd(), "config");
}

export function collectConfigRoots(): string[] {
  const roots = new Set<string>();
  roots.add(getConfigRoot());
  roots.add(process.cwd());
  return Array.from(roots);
}

async function exists(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate);
    return true;
  } catch {
    return false;
  }
}

export async function resolveConfigFilePath(
  options: CliRuntimeOptions,
): Promise<string | null> {
  if (options.config) {
    const explicit = path.resolve(options.config);
    if (!(await exists(explicit))) {
      throw new Error(`Config file not found at ${explicit}`);
    }
    return explicit;
  }

  for (const rootDir of collectConfigRoots()) {
    for (const name of CONFIG_FILENAMES) {
      const candidate = path.resolve(rootDir, name);
      if (await exists(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}
