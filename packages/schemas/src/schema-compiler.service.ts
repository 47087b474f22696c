import { Injectable } from "@nestjs/common";
import Ajv, { type ValidateFunction } from "ajv";
import { createHash } from "node:crypto";
import { parse as parseYaml } from "yaml";
import {
  SchemaCompilationError,
  ValidationFailureError,
  type JsonSchemaObject,
  type SchemaFormat,
} from "@agentmd/types";
import { DeclarationCompiler } from "./declaration";
import { toFieldProblems } from "./validation-errors";

export type ValidationOutcome =
  | { ok: true; value: unknown }
  | { ok: false; failure: ValidationFailureError };

export interface OutputSchemaHandle {
  readonly name: string;
  readonly description: string | null;
  readonly sourceHash: string;
  readonly jsonSchema: JsonSchemaObject;
  validate(raw: unknown): ValidationOutcome;
}

export const hashSchemaSource = (source: string): string =>
  createHash("sha256").update(source, "utf8").digest("hex");

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

@Injectable()
export class SchemaCompilerService {
  /**
   * Parses a YAML or JSON output declaration and compiles it into a
   * validation handle. Every problem in the declaration is reported in a
   * single {@link SchemaCompilationError}.
   */
  compile(source: string, format: SchemaFormat = "yaml"): OutputSchemaHandle {
    const declaration = this.parseDeclaration(source, format);
    const { result, problems } = DeclarationCompiler.compile(declaration);
    if (!result) {
      throw new SchemaCompilationError(problems);
    }

    const ajv = new Ajv({
      allErrors: true,
      coerceTypes: true,
      useDefaults: true,
      strict: false,
    });

    let validateFn: ValidateFunction;
    try {
      validateFn = ajv.compile(result.jsonSchema);
    } catch (error) {
      throw new SchemaCompilationError([
        { path: result.name, message: describeError(error) },
      ]);
    }

    const jsonSchema = structuredClone(result.jsonSchema);
    const name = result.name;

    return Object.freeze({
      name,
      description: result.description,
      sourceHash: hashSchemaSource(source),
      jsonSchema,
      validate(raw: unknown): ValidationOutcome {
        const candidate: unknown = structuredClone(raw);
        if (validateFn(candidate)) {
          return { ok: true, value: candidate };
        }
        return {
          ok: false,
          failure: new ValidationFailureError(name, toFieldProblems(validateFn.errors)),
        };
      },
    });
  }

  private parseDeclaration(source: string, format: SchemaFormat): unknown {
    if (source.trim().length === 0) {
      throw new SchemaCompilationError([
        { path: "", message: "declaration is empty" },
      ]);
    }
    try {
      return format === "json"
        ? JSON.parse(source)
        : parseYaml(source, { logLevel: "error" });
    } catch (error) {
      throw new SchemaCompilationError([
        {
          path: "",
          message: `declaration is not valid ${format.toUpperCase()}: ${describeError(error)}`,
        },
      ]);
    }
  }
}
