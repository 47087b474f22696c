import type { ProviderAttempt } from "./providers";

export type AgentmdErrorCode =
  | "malformed_definition"
  | "template_resolution"
  | "template_render"
  | "schema_compilation"
  | "validation_failure"
  | "provider_transient"
  | "provider_fatal"
  | "provider_exhausted"
  | "timeout";

export abstract class AgentmdError extends Error {
  abstract readonly code: AgentmdErrorCode;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedDefinitionError extends AgentmdError {
  readonly code = "malformed_definition";
  readonly line: number | null;

  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `${message} (line ${line})`);
    this.line = line;
  }
}

export class TemplateResolutionError extends AgentmdError {
  readonly code = "template_resolution";

  constructor(readonly fragment: string) {
    super(`Template fragment "${fragment}" could not be resolved.`);
  }
}

export class TemplateRenderError extends AgentmdError {
  readonly code = "template_render";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export interface SchemaProblem {
  path: string;
  message: string;
}

export class SchemaCompilationError extends AgentmdError {
  readonly code = "schema_compilation";

  constructor(readonly problems: readonly SchemaProblem[]) {
    super(
      `Output schema is invalid: ${problems
        .map((problem) =>
          problem.path ? `${problem.path}: ${problem.message}` : problem.message,
        )
        .join("; ")}`,
    );
  }
}

export type FieldProblemCode =
  | "missing"
  | "type"
  | "out_of_range"
  | "enum"
  | "pattern"
  | "length"
  | "unexpected"
  | "unparseable"
  | "invalid";

export interface FieldProblem {
  /** Dotted path of the offending field; `$` is the document root. */
  field: string;
  code: FieldProblemCode;
  message: string;
}

export class ValidationFailureError extends AgentmdError {
  readonly code = "validation_failure";

  constructor(
    readonly schemaName: string,
    readonly problems: readonly FieldProblem[],
  ) {
    super(
      `Output failed ${schemaName} validation: ${problems
        .map((problem) => `${problem.field} ${problem.message}`)
        .join("; ")}`,
    );
  }
}

export class ProviderTransientError extends AgentmdError {
  readonly code = "provider_transient";
  override readonly retryable = true;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ProviderFatalReason =
  | "authentication"
  | "bad_request"
  | "unsupported_schema"
  | "unknown_model"
  | "unknown_provider"
  | "unexpected";

export class ProviderFatalError extends AgentmdError {
  readonly code = "provider_fatal";

  constructor(
    message: string,
    readonly reason: ProviderFatalReason,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ProviderExhaustedError extends AgentmdError {
  readonly code = "provider_exhausted";

  constructor(
    readonly requestedModel: string,
    readonly attempts: readonly ProviderAttempt[],
  ) {
    const models = Array.from(new Set(attempts.map((attempt) => attempt.model)));
    super(
      `All providers failed for ${requestedModel} after ${attempts.length} attempt(s) across ${models.join(", ")}.`,
    );
  }
}

export class ExecutionTimeoutError extends AgentmdError {
  readonly code = "timeout";

  constructor(readonly timeoutMs: number) {
    super(`Execution exceeded the ${timeoutMs}ms deadline.`);
  }
}

export const isAgentmdError = (value: unknown): value is AgentmdError =>
  value instanceof AgentmdError;
