import type { AgentmdConfigInput, LogLevel } from "../types";

export type ConfigVersion = number;

/**
 * Version 0 files carry the flat settings of the first release alongside (or
 * instead of) the nested sections.
 */
export interface LegacyConfigInput extends AgentmdConfigInput {
  agents_dir?: string;
  log_level?: string;
  openrouter_api_key?: string;
}

export interface ConfigMigrationResult {
  config: AgentmdConfigInput;
  warnings?: string[];
}

export interface ConfigMigration {
  id: string;
  from: ConfigVersion;
  to: ConfigVersion;
  migrate(config: LegacyConfigInput): ConfigMigrationResult;
}

export const CURRENT_CONFIG_VERSION: ConfigVersion = 1;

const LEGACY_LOG_LEVELS: Record<string, LogLevel> = {
  critical: "fatal",
  error: "error",
  warning: "warn",
  warn: "warn",
  info: "info",
  debug: "debug",
};

const CONFIG_MIGRATIONS: ConfigMigration[] = [
  {
    id: "0001-nest-flat-settings",
    from: 0,
    to: 1,
    migrate(config) {
      const {
        agents_dir: agentsDir,
        log_level: logLevel,
        openrouter_api_key: apiKey,
        ...rest
      } = config;
      const warnings: string[] = [];
      const next: AgentmdConfigInput = { ...rest, version: CURRENT_CONFIG_VERSION };

      if (agentsDir !== undefined) {
        next.agents = {
          ...rest.agents,
          directories: [agentsDir, ...(rest.agents?.directories ?? [])],
        };
        warnings.push("agents_dir moved to agents.directories.");
      }

      if (logLevel !== undefined) {
        const level = LEGACY_LOG_LEVELS[logLevel.trim().toLowerCase()];
        if (level) {
          next.logging = { ...rest.logging, level };
          warnings.push("log_level moved to logging.level.");
        } else {
          warnings.push(`log_level "${logLevel}" is not recognised and was dropped.`);
        }
      }

      if (apiKey !== undefined) {
        warnings.push(
          "openrouter_api_key is no longer read from config files; set OPENROUTER_API_KEY instead.",
        );
      }

      return { config: next, warnings };
    },
  },
];

const CONFIG_MIGRATIONS_BY_SOURCE = new Map<ConfigVersion, ConfigMigration>(
  CONFIG_MIGRATIONS.map((migration) => [migration.from, migration]),
);

export interface ConfigMigrationOutcome {
  migrated: AgentmdConfigInput;
  initialVersion: ConfigVersion;
  finalVersion: ConfigVersion;
  appliedMigrations: string[];
  warnings: string[];
}

export function runConfigMigrations(
  input: LegacyConfigInput,
): ConfigMigrationOutcome {
  const initialVersion =
    typeof input.version === "number" ? input.version : 0;

  let currentVersion = initialVersion;
  let workingConfig: LegacyConfigInput = input;
  const appliedMigrations: string[] = [];
  const warnings: string[] = [];

  while (currentVersion < CURRENT_CONFIG_VERSION) {
    const migration = CONFIG_MIGRATIONS_BY_SOURCE.get(currentVersion);

    if (!migration) {
      throw new Error(
        `No migration available from config version ${currentVersion}.`,
      );
    }

    const { config: migratedConfig, warnings: migrationWarnings } =
      migration.migrate(workingConfig);

    workingConfig = migratedConfig;
    currentVersion = migration.to;
    appliedMigrations.push(migration.id);

    if (Array.isArray(migrationWarnings) && migrationWarnings.length > 0) {
      warnings.push(...migrationWarnings);
    }
  }

  return {
    migrated: workingConfig,
    initialVersion,
    finalVersion: currentVersion,
    appliedMigrations,
    warnings,
  };
}
