import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import fs from "fs/promises";
import { parse as parseYaml } from "yaml";
import { ConfigValidator } from "./validation/config-validator";
import {
  CURRENT_CONFIG_VERSION,
  runConfigMigrations,
  type LegacyConfigInput,
} from "./migrations";
import { MODULE_OPTIONS_TOKEN } from "./config.const";
import { agentmdConfig } from "./config.namespace";
import { ConfigStore } from "./config.store";
import { DEFAULT_CONFIG } from "./defaults";
import { resolveConfigFilePath } from "./config-path";
import type {
  AgentmdConfig,
  AgentmdConfigInput,
  CliRuntimeOptions,
} from "./types";

const CONFIG_SECTIONS = [
  "logging",
  "agents",
  "providers",
  "router",
  "execution",
  "observability",
] as const;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isConfigInput = (value: unknown): value is LegacyConfigInput =>
  isPlainObject(value) &&
  CONFIG_SECTIONS.every(
    (section) => value[section] === undefined || isPlainObject(value[section]),
  );

const mergeByKey = <T>(
  base: readonly T[],
  overrides: readonly T[] | undefined,
  keyOf: (item: T) => string,
): T[] => {
  if (!overrides) {
    return [...base];
  }
  const merged = new Map<string, T>(base.map((item) => [keyOf(item), item]));
  for (const item of overrides) {
    merged.set(keyOf(item), item);
  }
  return Array.from(merged.values());
};

/**
 * ConfigService resolves agentmd configuration from disk and merges it with
 * runtime overrides. Precedence: defaults, config file, CLI and environment.
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly moduleOptions: CliRuntimeOptions;
  private readonly validator: ConfigValidator;

  constructor(
    @Optional()
    @Inject(ConfigStore)
    private readonly configStore?: ConfigStore,
    @Optional()
    @Inject(MODULE_OPTIONS_TOKEN)
    moduleOptions?: CliRuntimeOptions,
    @Optional()
    @Inject(agentmdConfig.KEY)
    private readonly defaultsProvider?: ConfigType<typeof agentmdConfig>,
    @Optional()
    @Inject(ConfigValidator)
    validator?: ConfigValidator,
  ) {
    this.moduleOptions = moduleOptions ?? {};
    this.validator = validator ?? new ConfigValidator();
  }

  async load(options: CliRuntimeOptions = {}): Promise<AgentmdConfig> {
    const merged = { ...this.moduleOptions, ...this.removeUndefined(options) };
    const configPath = await resolveConfigFilePath(merged);
    const fileConfig = configPath ? await this.readConfigFile(configPath) : {};
    const config = this.compose(fileConfig, merged);
    if (this.configStore) {
      this.configStore.setSnapshot(config);
      return this.configStore.getSnapshot();
    }
    return config;
  }

  compose(
    input: LegacyConfigInput,
    options: CliRuntimeOptions = {},
  ): AgentmdConfig {
    const candidateVersion = input.version;
    if (
      typeof candidateVersion === "number" &&
      candidateVersion > CURRENT_CONFIG_VERSION
    ) {
      throw new Error(
        `This config declares newer config version ${candidateVersion} than supported version ${CURRENT_CONFIG_VERSION}.`,
      );
    }

    const { migrated, warnings } = runConfigMigrations(input);
    warnings.forEach((warning) => {
      this.logger.warn(`[Config migration] ${warning}`);
    });

    const overrides = {
      ...this.moduleOptions,
      ...this.removeUndefined(options),
    };
    const withFileLayer = this.applyConfigFileOverrides(
      this.resolveDefaultConfig(),
      migrated,
    );
    const finalConfig = this.applyCliOverrides(withFileLayer, overrides);

    this.validator.validate(finalConfig);

    return finalConfig;
  }

  parseSource(source: string): LegacyConfigInput {
    if (!source.trim()) {
      return {};
    }

    const parsed: unknown = parseYaml(source) ?? {};
    if (!isConfigInput(parsed)) {
      throw new Error(
        "Configuration must be a mapping whose sections are mappings.",
      );
    }
    return parsed;
  }

  private async readConfigFile(candidate: string): Promise<LegacyConfigInput> {
    const data = await fs.readFile(candidate, "utf-8");
    try {
      return this.parseSource(data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Unable to read config file ${candidate}: ${reason}`, {
        cause: error,
      });
    }
  }

  private resolveDefaultConfig(): AgentmdConfig {
    return structuredClone(this.defaultsProvider ?? DEFAULT_CONFIG);
  }

  private applyConfigFileOverrides(
    base: AgentmdConfig,
    input: AgentmdConfigInput,
  ): AgentmdConfig {
    return {
      version: CURRENT_CONFIG_VERSION,
      logging: {
        ...base.logging,
        ...input.logging,
      },
      agents: {
        ...base.agents,
        ...input.agents,
      },
      providers: {
        connections: mergeByKey(
          base.providers.connections,
          input.providers?.connections,
          (connection) => connection.name,
        ),
        models: mergeByKey(
          base.providers.models,
          input.providers?.models,
          (model) => model.id,
        ),
      },
      router: {
        ...base.router,
        ...input.router,
      },
      execution: {
        ...base.execution,
        ...input.execution,
      },
      observability: {
        ...base.observability,
        ...input.observability,
      },
    };
  }

  private applyCliOverrides(
    config: AgentmdConfig,
    options: CliRuntimeOptions,
  ): AgentmdConfig {
    const next = structuredClone(config);

    if (options.logLevel) {
      next.logging.level = options.logLevel;
    }

    if (options.logFile) {
      next.logging.destination = {
        type: "file",
        path: options.logFile,
        pretty: false,
      };
    }

    if (options.model) {
      next.router.defaultModel = options.model;
    }

    if (options.agentsDir && options.agentsDir.length > 0) {
      next.agents.directories = [...options.agentsDir];
    }

    if (options.fragmentsDir && options.fragmentsDir.length > 0) {
      next.agents.fragments = [...options.fragmentsDir];
    }

    if (options.timeoutMs !== undefined) {
      next.execution.timeoutMs = options.timeoutMs;
    }

    if (options.jsonlTrace) {
      next.observability.jsonlPath = options.jsonlTrace;
      if (!next.observability.sinks.includes("jsonl")) {
        next.observability.sinks.push("jsonl");
      }
    }

    return next;
  }

  private removeUndefined(options: CliRuntimeOptions): CliRuntimeOptions {
    const next: CliRuntimeOptions = {};
    for (const [key, value] of Object.entries(options)) {
      if (value !== undefined) {
        Object.assign(next, { [key]: value });
      }
    }
    return next;
  }
}
