import type { CliRuntimeOptions, LogLevel } from "./types";

const LOG_LEVEL_VALUES: readonly LogLevel[] = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }

  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return items.length > 0 ? items : undefined;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  return LOG_LEVEL_VALUES.find((level) => level === normalized);
}

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseNonNegativeInteger(value: string | undefined): number | undefined {
  const text = parseString(value);
  if (text === undefined || !/^\d+$/.test(text)) {
    return undefined;
  }
  return Number.parseInt(text, 10);
}

export function resolveCliRuntimeOptionsFromEnv(
  env: NodeJS.ProcessEnv
): CliRuntimeOptions {
  const options: CliRuntimeOptions = {};

  const config = parseString(env.AGENTMD_CONFIG);
  if (config !== undefined) {
    options.config = config;
  }

  const logLevel = parseLogLevel(env.AGENTMD_LOG_LEVEL);
  if (logLevel !== undefined) {
    options.logLevel = logLevel;
  }

  const logFile = parseString(env.AGENTMD_LOG_FILE);
  if (logFile !== undefined) {
    options.logFile = logFile;
  }

  const model = parseString(env.AGENTMD_MODEL);
  if (model !== undefined) {
    options.model = model;
  }

  const agentsDir = parseList(env.AGENTMD_AGENTS_DIR);
  if (agentsDir !== undefined) {
    options.agentsDir = agentsDir;
  }

  const fragmentsDir = parseList(env.AGENTMD_FRAGMENTS_DIR);
  if (fragmentsDir !== undefined) {
    options.fragmentsDir = fragmentsDir;
  }

  const timeoutMs = parseNonNegativeInteger(env.AGENTMD_TIMEOUT_MS);
  if (timeoutMs !== undefined) {
    options.timeoutMs = timeoutMs;
  }

  const jsonlTrace = parseString(env.AGENTMD_JSONL_TRACE);
  if (jsonlTrace !== undefined) {
    options.jsonlTrace = jsonlTrace;
  }

  return options;
}

export function resolveRuntimeOptions(
  moduleOptions?: CliRuntimeOptions,
  env: NodeJS.ProcessEnv = process.env,
): CliRuntimeOptions {
  const envOptions = resolveCliRuntimeOptionsFromEnv(env);
  return {
    ...envOptions,
    ...(moduleOptions ?? {}),
  } satisfies CliRuntimeOptions;
}
