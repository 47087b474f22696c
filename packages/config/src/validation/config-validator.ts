import { Injectable } from "@nestjs/common";
import { z } from "zod";
import { CURRENT_CONFIG_VERSION } from "../migrations";
import type { AgentmdConfig, ProvidersConfig, RouterConfig } from "../types";

export interface ConfigValidationIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  readonly summary: string;
  readonly issues: ConfigValidationIssue[];

  constructor(summary: string, issues: ConfigValidationIssue[]) {
    super(
      [summary, ...issues.map((issue) => `- ${issue.path}: ${issue.message}`)].join(
        "\n",
      ),
    );
    this.name = "ConfigValidationError";
    this.summary = summary;
    this.issues = issues;
  }
}

const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;
const ADAPTERS = ["openai_compatible", "anthropic", "noop"] as const;
const SINKS = ["logging", "jsonl", "otel", "usage"] as const;

const nonNegativeNumber = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).nonnegative(
    `${label} must not be negative`,
  );

const CONFIG_SCHEMA = z.object({
  version: z.literal(CURRENT_CONFIG_VERSION, {
    errorMap: () => ({ message: `version must equal ${CURRENT_CONFIG_VERSION}` }),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
    destination: z
      .object({
        type: z.enum(["stdout", "stderr", "file"]),
        path: z.string().min(1).optional(),
        pretty: z.boolean().optional(),
        colorize: z.boolean().optional(),
      })
      .optional(),
    enableTimestamps: z.boolean().optional(),
  }),
  agents: z.object({
    directories: z.array(z.string().min(1, "directories must not be empty strings")),
    fragments: z.array(z.string().min(1, "fragments must not be empty strings")),
  }),
  providers: z.object({
    connections: z.array(
      z.object({
        name: z.string().min(1, "name must be provided"),
        adapter: z.enum(ADAPTERS),
        baseUrl: z.string().url("baseUrl must be a URL").optional(),
        apiKey: z.string().optional(),
        apiKeyEnv: z.string().min(1).optional(),
        headers: z.record(z.string(), z.string()).optional(),
        appName: z.string().optional(),
        referer: z.string().optional(),
        anthropicVersion: z.string().optional(),
      }),
    ),
    models: z.array(
      z.object({
        id: z.string().min(1, "id must be provided"),
        provider: z.string().min(1, "provider must be provided"),
        label: z.string().optional(),
        pricing: z.object({
          inputPerMillion: nonNegativeNumber("inputPerMillion"),
          outputPerMillion: nonNegativeNumber("outputPerMillion"),
        }),
        fallbacks: z.array(z.string().min(1)).optional(),
        structuredOutput: z.boolean().optional(),
        promptCaching: z.boolean().optional(),
        contextWindow: z.number().int().positive().optional(),
        maxOutputTokens: z.number().int().positive().optional(),
      }),
    ),
  }),
  router: z.object({
    attemptsPerModel: z
      .number()
      .int("attemptsPerModel must be an integer")
      .positive("attemptsPerModel must be greater than zero"),
    baseDelayMs: nonNegativeNumber("baseDelayMs"),
    maxDelayMs: nonNegativeNumber("maxDelayMs"),
    defaultModel: z.string().min(1).optional(),
  }),
  execution: z.object({
    timeoutMs: z
      .number()
      .int("timeoutMs must be an integer")
      .nonnegative("timeoutMs must not be negative"),
  }),
  observability: z.object({
    sinks: z.array(z.enum(SINKS)),
    jsonlPath: z.string().min(1).optional(),
    tracerName: z.string().min(1).optional(),
  }),
});

@Injectable()
export class ConfigValidator {
  validate(config: AgentmdConfig): void {
    const issues: ConfigValidationIssue[] = [];

    const result = CONFIG_SCHEMA.safeParse(config);
    if (!result.success) {
      for (const issue of result.error.issues) {
        this.pushValidationIssue(
          issues,
          issue.path.map(String).join(".") || "(root)",
          issue.message,
        );
      }
    } else {
      this.validateProviderReferences(config.providers, issues);
      this.validateRouter(config.router, config.providers, issues);
      if (
        config.observability.sinks.includes("jsonl") &&
        !config.observability.jsonlPath
      ) {
        this.pushValidationIssue(
          issues,
          "observability.jsonlPath",
          "jsonlPath is required when the jsonl sink is enabled",
        );
      }
    }

    if (issues.length > 0) {
      throw new ConfigValidationError(
        this.createValidationSummary(issues.length),
        issues,
      );
    }
  }

  private validateProviderReferences(
    providers: ProvidersConfig,
    issues: ConfigValidationIssue[],
  ): void {
    const connectionNames = new Set<string>();
    providers.connections.forEach((connection, index) => {
      if (connectionNames.has(connection.name)) {
        this.pushValidationIssue(
          issues,
          `providers.connections.${index}.name`,
          `duplicate connection "${connection.name}"`,
        );
      }
      connectionNames.add(connection.name);
    });

    const modelIds = new Set<string>();
    providers.models.forEach((model, index) => {
      if (modelIds.has(model.id)) {
        this.pushValidationIssue(
          issues,
          `providers.models.${index}.id`,
          `duplicate model "${model.id}"`,
        );
      }
      modelIds.add(model.id);
      if (!connectionNames.has(model.provider)) {
        this.pushValidationIssue(
          issues,
          `providers.models.${index}.provider`,
          `unknown connection "${model.provider}"`,
        );
      }
    });

    providers.models.forEach((model, index) => {
      (model.fallbacks ?? []).forEach((fallback, fallbackIndex) => {
        const path = `providers.models.${index}.fallbacks.${fallbackIndex}`;
        if (fallback === model.id) {
          this.pushValidationIssue(issues, path, "a model cannot fall back to itself");
        } else if (!modelIds.has(fallback)) {
          this.pushValidationIssue(issues, path, `unknown model "${fallback}"`);
        }
      });
    });
  }

  private validateRouter(
    router: RouterConfig,
    providers: ProvidersConfig,
    issues: ConfigValidationIssue[],
  ): void {
    if (router.maxDelayMs < router.baseDelayMs) {
      this.pushValidationIssue(
        issues,
        "router.maxDelayMs",
        "maxDelayMs must be greater than or equal to baseDelayMs",
      );
    }

    if (
      router.defaultModel !== undefined &&
      !providers.models.some((model) => model.id === router.defaultModel)
    ) {
      this.pushValidationIssue(
        issues,
        "router.defaultModel",
        `unknown model "${router.defaultModel}"`,
      );
    }
  }

  private createValidationSummary(count: number): string {
    return count === 1
      ? "Configuration is invalid (1 issue)."
      : `Configuration is invalid (${count} issues).`;
  }

  private pushValidationIssue(
    issues: ConfigValidationIssue[],
    path: string,
    message: string,
  ): void {
    issues.push({ path, message });
  }
}
