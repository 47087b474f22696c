import { parseLogLevel } from "./runtime-env";
import type { CliRuntimeOptions } from "./types";

export type CliOptionKind = "string" | "list" | "number" | "boolean";

export interface CliOptionDefinition {
  readonly flag: string;
  readonly aliases: readonly string[];
  /** Key the parsed value is stored under. */
  readonly runtimeKey: string;
  readonly kind: CliOptionKind;
  readonly description: string;
}

const option = (
  flag: string,
  runtimeKey: string,
  kind: CliOptionKind,
  description: string,
  aliases: readonly string[] = [],
): CliOptionDefinition => ({ flag, aliases, runtimeKey, kind, description });

export const CLI_OPTION_DEFINITIONS: readonly CliOptionDefinition[] = [
  option("--config", "config", "string", "Path to a configuration file.", ["-c"]),
  option("--log-level", "logLevel", "string", "silent, fatal, error, warn, info, debug or trace."),
  option("--log-file", "logFile", "string", "Write logs to this file instead of stderr."),
  option("--agents-dir", "agentsDir", "list", "Directories searched for *.agent.md files."),
  option("--fragments-dir", "fragmentsDir", "list", "Directories holding shared prompt fragments."),
  option("--jsonl-trace", "jsonlTrace", "string", "Append execution spans to this JSONL file."),
  option("--model", "model", "string", "Model to use instead of the agent's own.", ["-m"]),
  option("--timeout", "timeoutMs", "number", "Execution deadline in milliseconds; 0 disables it."),
  option("--query", "query", "string", "Query passed to the agent as `query`.", ["-q"]),
  option("--context", "context", "string", "JSON object merged into the template context."),
  option("--temperature", "temperature", "number", "Sampling temperature override.", ["-t"]),
  option("--format", "format", "string", "Lint output format: human, json or github."),
  option("--help", "help", "boolean", "Show usage.", ["-h"]),
];

const indexByFlag = (
  kinds: readonly CliOptionKind[],
): ReadonlyMap<string, CliOptionDefinition> => {
  const index = new Map<string, CliOptionDefinition>();
  for (const definition of CLI_OPTION_DEFINITIONS) {
    if (!kinds.includes(definition.kind)) {
      continue;
    }
    for (const flag of [definition.flag, ...definition.aliases]) {
      index.set(flag, definition);
    }
  }
  return index;
};

export const CLI_VALUE_OPTIONS_BY_FLAG = indexByFlag(["string", "list", "number"]);
export const CLI_BOOLEAN_OPTIONS_BY_FLAG = indexByFlag(["boolean"]);

const lastString = (value: unknown): string | undefined => {
  if (Array.isArray(value)) {
    return lastString(value[value.length - 1]);
  }
  return typeof value === "string" ? value : undefined;
};

const toList = (value: unknown): string[] | undefined => {
  const raw = Array.isArray(value) ? value : [value];
  const items = raw
    .filter((item): item is string => typeof item === "string")
    .flatMap((item) => item.split(","))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
};

/**
 * Picks the configuration-level options out of parsed CLI flags. Values that
 * cannot be interpreted are left out so configuration defaults apply.
 */
export function toCliRuntimeOptions(options: Record<string, unknown>): CliRuntimeOptions {
  const runtime: CliRuntimeOptions = {};

  const config = lastString(options.config);
  if (config) runtime.config = config;

  const logLevel = parseLogLevel(lastString(options.logLevel));
  if (logLevel) runtime.logLevel = logLevel;

  const logFile = lastString(options.logFile);
  if (logFile) runtime.logFile = logFile;

  const model = lastString(options.model);
  if (model) runtime.model = model;

  const agentsDir = toList(options.agentsDir);
  if (agentsDir) runtime.agentsDir = agentsDir;

  const fragmentsDir = toList(options.fragmentsDir);
  if (fragmentsDir) runtime.fragmentsDir = fragmentsDir;

  const jsonlTrace = lastString(options.jsonlTrace);
  if (jsonlTrace) runtime.jsonlTrace = jsonlTrace;

  const timeout = lastString(options.timeoutMs);
  if (timeout !== undefined && /^\d+$/.test(timeout.trim())) {
    runtime.timeoutMs = Number.parseInt(timeout, 10);
  }

  return runtime;
}
