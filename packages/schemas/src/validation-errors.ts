import type { ErrorObject } from "ajv";
import type { FieldProblem, FieldProblemCode } from "@agentmd/types";

export const ROOT_FIELD = "$";

const KEYWORD_CODES: Readonly<Record<string, FieldProblemCode>> = {
  required: "missing",
  type: "type",
  minimum: "out_of_range",
  maximum: "out_of_range",
  exclusiveMinimum: "out_of_range",
  exclusiveMaximum: "out_of_range",
  enum: "enum",
  pattern: "pattern",
  minLength: "length",
  maxLength: "length",
  minItems: "length",
  maxItems: "length",
  additionalProperties: "unexpected",
};

const decodeJsonPointerSegment = (segment: string): string =>
  segment.replace(/~1/g, "/").replace(/~0/g, "~");

const normalizeInstancePath = (instancePath: string): string =>
  instancePath
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(decodeJsonPointerSegment)
    .join(".");

const appendPath = (parent: string, segment: string): string =>
  parent ? `${parent}.${segment}` : segment;

const getParam = (error: ErrorObject, key: string): unknown => {
  const params: unknown = error.params;
  if (typeof params !== "object" || params === null) {
    return undefined;
  }
  return Object.entries(params).find(([name]) => name === key)?.[1];
};

const getParamString = (error: ErrorObject, key: string): string | undefined => {
  const value = getParam(error, key);
  return typeof value === "string" ? value : undefined;
};

const describeAllowedValues = (error: ErrorObject): string | undefined => {
  const values = getParam(error, "allowedValues");
  return Array.isArray(values)
    ? values.map((value) => JSON.stringify(value)).join(", ")
    : undefined;
};

const describeType = (error: ErrorObject): string | undefined => {
  const type = getParam(error, "type");
  if (typeof type === "string") {
    return type.split(",").join(" or ");
  }
  if (Array.isArray(type)) {
    return type.map(String).join(" or ");
  }
  return undefined;
};

const toFieldProblem = (error: ErrorObject): FieldProblem => {
  const path = normalizeInstancePath(error.instancePath);
  const code = KEYWORD_CODES[error.keyword] ?? "invalid";
  const fallback = error.message ?? "is invalid";

  switch (error.keyword) {
    case "required": {
      const missing = getParamString(error, "missingProperty");
      return {
        field: missing ? appendPath(path, missing) : path || ROOT_FIELD,
        code,
        message: "is required",
      };
    }
    case "additionalProperties": {
      const extra = getParamString(error, "additionalProperty");
      return {
        field: extra ? appendPath(path, extra) : path || ROOT_FIELD,
        code,
        message: "is not allowed",
      };
    }
    case "type": {
      const type = describeType(error);
      return {
        field: path || ROOT_FIELD,
        code,
        message: type ? `must be ${type}` : fallback,
      };
    }
    case "enum": {
      const allowed = describeAllowedValues(error);
      return {
        field: path || ROOT_FIELD,
        code,
        message: allowed ? `must be one of: ${allowed}` : fallback,
      };
    }
    default:
      return { field: path || ROOT_FIELD, code, message: fallback };
  }
};

/**
 * Maps ajv errors to field problems, dropping duplicates that ajv reports for
 * the same field and keyword under `allErrors`.
 */
export const toFieldProblems = (
  errors: readonly ErrorObject[] | null | undefined,
): FieldProblem[] => {
  const seen = new Set<string>();
  const problems: FieldProblem[] = [];
  for (const error of errors ?? []) {
    const problem = toFieldProblem(error);
    const key = `${problem.field}\u0000${problem.code}\u0000${problem.message}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    problems.push(problem);
  }
  return problems;
};
