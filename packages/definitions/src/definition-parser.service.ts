import { Injectable } from "@nestjs/common";
import { createHash } from "crypto";
import { parse as parseYaml } from "yaml";
import {
  MalformedDefinitionError,
  type AgentDefinition,
  type ContextBuilderSource,
  type DefinitionSection,
  type EvolutionEntry,
  type OutputSchemaSource,
} from "@agentmd/types";
import { scanSections, unwrapBody, type ScannedSection } from "./markdown-scanner";

export const DEFAULT_TEMPERATURE = 0.7;
export const TEMPERATURE_RANGE = { min: 0, max: 2 } as const;

const KNOWN_SECTIONS = [
  "system_prompt",
  "user_prompt",
  "output_schema",
  "context_builder",
] as const;
type KnownSection = (typeof KNOWN_SECTIONS)[number];

const TEMPLATE_TAGS = new Set([
  "jinja2",
  "jinja",
  "j2",
  "nunjucks",
  "njk",
  "text",
  "md",
  "markdown",
]);

const SCHEMA_FORMATS: ReadonlyMap<string, OutputSchemaSource["format"]> = new Map<string, OutputSchemaSource["format"]>([
  ["yaml", "yaml"],
  ["yml", "yaml"],
  ["json", "json"],
]);

const RESERVED_METADATA_KEYS = new Set([
  "name",
  "description",
  "model",
  "temperature",
  "evolution_history",
]);

export interface ParseOptions {
  /** Identifier of the document, used when metadata carries no name. */
  sourceId?: string;
}

interface Frontmatter {
  metadata: Record<string, unknown>;
  bodyStart: number;
}

interface ResolvedSection {
  section: ScannedSection;
  tag: string | null;
  text: string;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isKnownSection = (label: string): label is KnownSection =>
  KNOWN_SECTIONS.some((known) => known === label);

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

export const hashSource = (text: string): string =>
  createHash("sha256").update(text, "utf8").digest("hex");

/**
 * Parses agent definition documents: a YAML metadata block followed by
 * marker-delimited sections (`<!-- System Prompt -->` and friends).
 */
@Injectable()
export class DefinitionParserService {
  parse(rawText: string, options: ParseOptions = {}): AgentDefinition {
    const text = rawText.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
    if (text.trim().length === 0) {
      throw new MalformedDefinitionError("Definition document is empty");
    }

    const lines = text.split("\n");
    const { metadata, bodyStart } = this.readFrontmatter(lines);
    const scan = scanSections(lines.slice(bodyStart), bodyStart);
    const warnings = [...scan.warnings];

    const known = new Map<KnownSection, ResolvedSection>();
    const extraSections: DefinitionSection[] = [];

    for (const section of scan.sections) {
      const body = unwrapBody(section.body);
      if (body.trailingText) {
        warnings.push(
          `text after the fenced block in section "${section.displayLabel}" ignored`,
        );
      }

      if (!isKnownSection(section.label)) {
        extraSections.push({
          label: section.label,
          tag: body.tag,
          text: body.text,
          line: section.line,
        });
        continue;
      }

      if (known.has(section.label)) {
        warnings.push(`duplicate section "${section.displayLabel}" ignored`);
        continue;
      }
      known.set(section.label, { section, tag: body.tag, text: body.text });
    }

    const systemPromptTemplate = this.readPrompt(known.get("system_prompt"), warnings);
    const userPromptTemplate = this.readPrompt(known.get("user_prompt"), warnings);
    const name = this.readName(metadata, options.sourceId, warnings);

    if (!systemPromptTemplate.trim() && !userPromptTemplate.trim()) {
      throw new MalformedDefinitionError(
        `Definition "${name}" declares neither a system prompt nor a user prompt`,
      );
    }

    const evolutionEntries = this.readEvolution(metadata.evolution_history, warnings);

    const definition: AgentDefinition = {
      name,
      description: typeof metadata.description === "string" ? metadata.description.trim() : "",
      modelId: this.readModel(metadata.model, warnings),
      temperature: this.readTemperature(metadata.temperature, warnings),
      metadata: Object.fromEntries(
        Object.entries(metadata).filter(([key]) => !RESERVED_METADATA_KEYS.has(key)),
      ),
      evolutionEntries,
      latestVersion: evolutionEntries.reduce(
        (latest, entry) => Math.max(latest, entry.version),
        1,
      ),
      systemPromptTemplate,
      userPromptTemplate,
      outputSchemaSource: this.readSchema(known.get("output_schema"), warnings),
      contextBuilderSource: this.readContextBuilder(known.get("context_builder")),
      extraSections,
      sourceId: options.sourceId ?? null,
      sourceHash: hashSource(rawText),
      warnings,
    };

    return deepFreeze(definition);
  }

  private readFrontmatter(lines: readonly string[]): Frontmatter {
    if (lines[0]?.trim() !== "---") {
      return { metadata: {}, bodyStart: 0 };
    }

    const closing = lines.findIndex(
      (line, index) => index > 0 && (line.trim() === "---" || line.trim() === "..."),
    );
    if (closing === -1) {
      throw new MalformedDefinitionError("Metadata block is not terminated", 1);
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(lines.slice(1, closing).join("\n"), { logLevel: "error" });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedDefinitionError(`Metadata is not valid YAML: ${reason}`, 2);
    }

    if (parsed === null || parsed === undefined) {
      return { metadata: {}, bodyStart: closing + 1 };
    }
    if (!isPlainObject(parsed)) {
      throw new MalformedDefinitionError("Metadata must be a mapping", 2);
    }
    return { metadata: parsed, bodyStart: closing + 1 };
  }

  private readName(
    metadata: Record<string, unknown>,
    sourceId: string | undefined,
    warnings: string[],
  ): string {
    const { name } = metadata;
    if (typeof name === "string" && name.trim()) {
      return name.trim();
    }
    if (name !== undefined && name !== null) {
      warnings.push("name must be a non-empty string");
    }
    if (sourceId && sourceId.trim()) {
      return sourceId.trim();
    }
    throw new MalformedDefinitionError(
      "Definition has no name and no source identifier",
    );
  }

  private readModel(model: unknown, warnings: string[]): string | null {
    if (model === undefined || model === null) {
      return null;
    }
    if (typeof model === "string" && model.trim()) {
      return model.trim();
    }
    warnings.push("model must be a non-empty string");
    return null;
  }

  private readTemperature(value: unknown, warnings: string[]): number {
    if (value === undefined || value === null) {
      return DEFAULT_TEMPERATURE;
    }
    if (
      typeof value === "number" &&
      Number.isFinite(value) &&
      value >= TEMPERATURE_RANGE.min &&
      value <= TEMPERATURE_RANGE.max
    ) {
      return value;
    }
    warnings.push(
      `temperature must be a number between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max}; using ${DEFAULT_TEMPERATURE}`,
    );
    return DEFAULT_TEMPERATURE;
  }

  private readEvolution(value: unknown, warnings: string[]): EvolutionEntry[] {
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      warnings.push("evolution_history must be a list");
      return [];
    }

    const entries: EvolutionEntry[] = [];
    value.forEach((item: unknown, index) => {
      if (!isPlainObject(item)) {
        warnings.push(`evolution_history[${index}] must be a mapping`);
        return;
      }
      const version = Number(item.version ?? 1);
      if (!Number.isInteger(version) || version < 1) {
        warnings.push(`evolution_history[${index}].version must be a positive integer`);
        return;
      }
      entries.push({
        version,
        date: this.readDate(item.date),
        notes: this.readNotes(item.changes ?? item.notes),
      });
    });
    return entries;
  }

  private readDate(value: unknown): string | null {
    if (value instanceof Date) {
      return value.toISOString().slice(0, 10);
    }
    if (typeof value === "string" || typeof value === "number") {
      return String(value);
    }
    return null;
  }

  private readNotes(value: unknown): string {
    if (typeof value === "string") {
      return value.trim();
    }
    if (Array.isArray(value)) {
      return value.map((item) => String(item).trim()).join("; ");
    }
    return "";
  }

  private readPrompt(resolved: ResolvedSection | undefined, warnings: string[]): string {
    if (!resolved) {
      return "";
    }
    if (resolved.tag !== null && !TEMPLATE_TAGS.has(resolved.tag)) {
      warnings.push(
        `section "${resolved.section.displayLabel}" uses unexpected fence tag "${resolved.tag}"`,
      );
    }
    return resolved.text;
  }

  private readSchema(
    resolved: ResolvedSection | undefined,
    warnings: string[],
  ): OutputSchemaSource | null {
    if (!resolved) {
      return null;
    }
    const format = SCHEMA_FORMATS.get(resolved.tag ?? "yaml");
    if (!format) {
      throw new MalformedDefinitionError(
        `Output schema must be declared as yaml or json, not "${resolved.tag}"`,
        resolved.section.line,
      );
    }
    if (!resolved.text.trim()) {
      warnings.push(`section "${resolved.section.displayLabel}" is empty`);
      return null;
    }
    return { source: resolved.text, format, line: resolved.section.line };
  }

  private readContextBuilder(
    resolved: ResolvedSection | undefined,
  ): ContextBuilderSource | null {
    if (!resolved || !resolved.text.trim()) {
      return null;
    }
    return { source: resolved.text, tag: resolved.tag };
  }
}
