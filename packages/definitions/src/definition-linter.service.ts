import { Inject, Injectable, Optional } from "@nestjs/common";
import type { Logger } from "pino";
import { parse as parseYaml } from "yaml";
import {
  MalformedDefinitionError,
  SchemaCompilationError,
  type AgentDefinition,
} from "@agentmd/types";
import { InjectLogger } from "@agentmd/io";
import { SchemaCompilerService } from "@agentmd/schemas";
import { TemplateRendererService } from "@agentmd/templates";
import { DefinitionParserService, TEMPERATURE_RANGE } from "./definition-parser.service";
import type { DocumentSource } from "./document-source";
import { MODEL_CATALOG } from "./definitions.tokens";

export type LintIssueKind = "structure" | "schema" | "template_syntax";
export type LintSeverity = "error" | "warning";

export interface LintIssue {
  line?: number;
  message: string;
  kind: LintIssueKind;
  severity: LintSeverity;
}

export interface LintReport {
  id: string;
  location: string;
  issues: LintIssue[];
}

export interface ModelCatalog {
  has(modelId: string): boolean;
}

const REQUIRED_FIELDS = ["name", "description", "model"] as const;

/** Parser warnings about fields the linter reports as errors itself. */
const SUPERSEDED_WARNINGS = [/^name must/, /^model must/, /^temperature must/];

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPresent = (value: unknown): boolean =>
  value !== undefined &&
  value !== null &&
  value !== false &&
  !(typeof value === "string" && value.trim().length === 0);

export const hasErrors = (report: LintReport): boolean =>
  report.issues.some((issue) => issue.severity === "error");

interface FrontmatterCheck {
  issues: LintIssue[];
  metadata: Record<string, unknown>;
}

@Injectable()
export class DefinitionLinterService {
  constructor(
    @Inject(DefinitionParserService)
    private readonly parser: DefinitionParserService,
    @Inject(TemplateRendererService)
    private readonly renderer: TemplateRendererService,
    @Inject(SchemaCompilerService)
    private readonly schemas: SchemaCompilerService,
    @InjectLogger("definitions:linter") private readonly logger: Logger,
    @Optional()
    @Inject(MODEL_CATALOG)
    private readonly models?: ModelCatalog,
  ) {}

  lintSource(id: string, rawText: string, location = id): LintReport {
    const text = rawText.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
    const frontmatter = this.checkFrontmatter(text);
    const issues = [...frontmatter.issues];

    if (!issues.some((issue) => issue.severity === "error")) {
      let definition: AgentDefinition | null = null;
      try {
        definition = this.parser.parse(text, { sourceId: id });
      } catch (error) {
        if (!(error instanceof MalformedDefinitionError)) {
          throw error;
        }
        issues.push({
          ...(error.line !== null ? { line: error.line } : {}),
          message: `Failed to parse agent definition: ${error.message}`,
          kind: "structure",
          severity: "error",
        });
      }

      if (definition) {
        issues.push(
          ...this.checkRequiredFields(frontmatter.metadata, definition),
          ...this.checkTemplates(definition),
          ...this.checkOutputSchema(definition),
          ...this.checkModel(definition),
          ...this.parserWarnings(definition),
        );
      }
    }

    const report: LintReport = { id, location, issues };
    this.logger.debug(
      { agent: id, location, issues: issues.length, valid: !hasErrors(report) },
      "Linted agent definition",
    );
    return report;
  }

  async lintCatalog(source: DocumentSource): Promise<LintReport[]> {
    const reports: LintReport[] = [];
    for (const id of await source.list()) {
      const document = await source.read(id);
      reports.push(this.lintSource(id, document.text, document.location));
    }

    const valid = reports.filter((report) => !hasErrors(report)).length;
    this.logger.info(
      { files: reports.length, valid },
      "Definition lint complete",
    );
    return reports;
  }

  private checkFrontmatter(text: string): FrontmatterCheck {
    const lines = text.split("\n");
    if (lines[0]?.trim() !== "---") {
      return {
        issues: [
          {
            line: 1,
            message: "File must start with YAML frontmatter delimiter '---'",
            kind: "structure",
            severity: "error",
          },
        ],
        metadata: {},
      };
    }

    const closing = lines.findIndex((line, index) => index > 0 && line.trim() === "---");
    if (closing === -1) {
      return {
        issues: [
          {
            message: "Missing closing YAML frontmatter delimiter '---'",
            kind: "structure",
            severity: "error",
          },
        ],
        metadata: {},
      };
    }

    const block = lines.slice(1, closing).join("\n");
    if (block.trim().length === 0) {
      return {
        issues: [
          {
            line: closing + 1,
            message: "Empty YAML frontmatter section",
            kind: "structure",
            severity: "warning",
          },
        ],
        metadata: {},
      };
    }

    try {
      const parsed: unknown = parseYaml(block, { logLevel: "error" });
      return { issues: [], metadata: isPlainObject(parsed) ? parsed : {} };
    } catch {
      // The parser reports the YAML error with its location.
      return { issues: [], metadata: {} };
    }
  }

  private checkRequiredFields(
    metadata: Record<string, unknown>,
    definition: AgentDefinition,
  ): LintIssue[] {
    const issues: LintIssue[] = REQUIRED_FIELDS.filter(
      (field) => !isPresent(metadata[field]),
    ).map((field): LintIssue => ({
      message: `Missing required field: ${field}`,
      kind: "schema",
      severity: "error",
    }));

    if (!definition.systemPromptTemplate.trim()) {
      issues.push({ message: "Missing system prompt section", kind: "schema", severity: "error" });
    }
    if (!definition.userPromptTemplate.trim()) {
      issues.push({ message: "Missing user prompt section", kind: "schema", severity: "error" });
    }

    const { temperature } = metadata;
    if (
      temperature !== undefined &&
      temperature !== null &&
      (typeof temperature !== "number" ||
        !Number.isFinite(temperature) ||
        temperature < TEMPERATURE_RANGE.min ||
        temperature > TEMPERATURE_RANGE.max)
    ) {
      issues.push({
        message: `Temperature must be a number between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max}`,
        kind: "schema",
        severity: "error",
      });
    }
    return issues;
  }

  private checkTemplates(definition: AgentDefinition): LintIssue[] {
    const templates = [
      ["System Prompt", definition.systemPromptTemplate],
      ["User Prompt", definition.userPromptTemplate],
    ] as const;

    const issues: LintIssue[] = [];
    for (const [label, template] of templates) {
      if (!template.trim()) {
        continue;
      }
      try {
        this.renderer.check(template, { name: label });
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        issues.push({
          message: detail,
          kind: "template_syntax",
          severity: "error",
        });
      }
    }
    return issues;
  }

  private checkOutputSchema(definition: AgentDefinition): LintIssue[] {
    const source = definition.outputSchemaSource;
    if (!source) {
      return [];
    }
    try {
      this.schemas.compile(source.source, source.format);
      return [];
    } catch (error) {
      if (!(error instanceof SchemaCompilationError)) {
        throw error;
      }
      return error.problems.map((problem): LintIssue => ({
        line: source.line,
        message: `Invalid output schema: ${
          problem.path ? `${problem.path}: ${problem.message}` : problem.message
        }`,
        kind: "schema",
        severity: "error",
      }));
    }
  }

  private checkModel(definition: AgentDefinition): LintIssue[] {
    if (!this.models || !definition.modelId || this.models.has(definition.modelId)) {
      return [];
    }
    return [
      {
        message: `Model "${definition.modelId}" is not configured in providers.models`,
        kind: "schema",
        severity: "warning",
      },
    ];
  }

  private parserWarnings(definition: AgentDefinition): LintIssue[] {
    return definition.warnings
      .filter((warning) => !SUPERSEDED_WARNINGS.some((pattern) => pattern.test(warning)))
      .map((warning): LintIssue => ({ message: warning, kind: "structure", severity: "warning" }));
  }
}
