import { Injectable } from "@nestjs/common";
import { toCliRuntimeOptions, type CliRuntimeOptions } from "@agentmd/config";
import { isLintOutputFormat, type LintOutputFormat } from "@agentmd/definitions";
import type { TemplateContext } from "@agentmd/types";
import { CliParseError } from "./cli-parser.service";

const lastValue = (value: unknown): unknown =>
  Array.isArray(value) ? value[value.length - 1] : value;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Interprets parsed flags for commands and for configuration loading. */
@Injectable()
export class CliOptionsService {
  runtime(options: Record<string, unknown>): CliRuntimeOptions {
    return toCliRuntimeOptions(options);
  }

  string(options: Record<string, unknown>, key: string): string | undefined {
    const value = lastValue(options[key]);
    return typeof value === "string" && value.length > 0 ? value : undefined;
  }

  number(options: Record<string, unknown>, key: string): number | undefined {
    const raw = this.string(options, key);
    if (raw === undefined) {
      return undefined;
    }
    const value = Number(raw);
    if (raw.trim().length === 0 || !Number.isFinite(value)) {
      throw new CliParseError(`Option ${key} must be a number, got "${raw}".`);
    }
    return value;
  }

  context(options: Record<string, unknown>): TemplateContext {
    const raw = this.string(options, "context");
    if (raw === undefined) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new CliParseError(`Invalid JSON context: ${detail}`);
    }
    if (!isPlainObject(parsed)) {
      throw new CliParseError("The --context value must be a JSON object.");
    }
    return parsed;
  }

  lintFormat(options: Record<string, unknown>): LintOutputFormat {
    const format = this.string(options, "format") ?? "human";
    if (!isLintOutputFormat(format)) {
      throw new CliParseError(
        `Unknown format "${format}"; expected human, json or github.`,
      );
    }
    return format;
  }
}
