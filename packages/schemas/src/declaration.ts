import type { JsonSchemaObject, SchemaProblem } from "@agentmd/types";

export const TYPE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
export const JSON_SCHEMA_DRAFT = "http://json-schema.org/draft-07/schema#";

const SCALAR_TYPES = ["string", "integer", "number", "boolean"] as const;
const FIELD_TYPES = [...SCALAR_TYPES, "object", "array"] as const;
type FieldType = (typeof FIELD_TYPES)[number];

const SHORTHAND_PATTERN = /^([a-z]+)(\[\])?(\?)?$/;

const TYPE_KEYS = new Set(["fields", "description", "extra"]);
const FIELD_KEYS = new Set([
  "type",
  "description",
  "optional",
  "required",
  "nullable",
  "default",
  "enum",
  "minimum",
  "maximum",
  "exclusiveMinimum",
  "exclusiveMaximum",
  "minLength",
  "maxLength",
  "pattern",
  "items",
  "minItems",
  "maxItems",
  "fields",
  "extra",
]);

const NUMERIC_KEYS = ["minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum"] as const;
const STRING_LENGTH_KEYS = ["minLength", "maxLength"] as const;
const ARRAY_LENGTH_KEYS = ["minItems", "maxItems"] as const;

export interface CompiledDeclaration {
  name: string;
  description: string | null;
  jsonSchema: JsonSchemaObject;
}

interface CompiledField {
  schema: JsonSchemaObject;
  optional: boolean;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isFieldType = (value: string): value is FieldType =>
  FIELD_TYPES.some((type) => type === value);

const joinPath = (parent: string, key: string): string =>
  parent ? `${parent}.${key}` : key;

const matchesType = (type: FieldType, value: unknown): boolean => {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "object":
      return isPlainObject(value);
    case "array":
      return Array.isArray(value);
  }
};

/**
 * Compiles a parsed output-schema declaration into a draft-07 JSON Schema.
 * Problems are collected rather than thrown so every mistake is reported at
 * once.
 */
export class DeclarationCompiler {
  private readonly problems: SchemaProblem[] = [];

  static compile(declaration: unknown): {
    result: CompiledDeclaration | null;
    problems: SchemaProblem[];
  } {
    const compiler = new DeclarationCompiler();
    const result = compiler.compileDeclaration(declaration);
    return { result: compiler.problems.length > 0 ? null : result, problems: compiler.problems };
  }

  private problem(path: string, message: string): void {
    this.problems.push({ path, message });
  }

  private compileDeclaration(declaration: unknown): CompiledDeclaration | null {
    if (!isPlainObject(declaration)) {
      this.problem("", "declaration must be a mapping with a single type name");
      return null;
    }

    const names = Object.keys(declaration);
    const [name] = names;
    if (names.length !== 1 || name === undefined) {
      this.problem(
        "",
        `declaration must define exactly one type, found ${names.length}`,
      );
      return null;
    }
    if (!TYPE_NAME_PATTERN.test(name)) {
      this.problem(name, "type name must be an identifier");
    }

    const body = declaration[name];
    if (!isPlainObject(body)) {
      this.problem(name, "type must be a mapping with fields");
      return null;
    }

    this.rejectUnknownKeys(body, TYPE_KEYS, name);
    const description = this.readDescription(body.description, name);
    const objectSchema = this.compileObject(body.fields, body.extra, name);

    return {
      name,
      description,
      jsonSchema: {
        $schema: JSON_SCHEMA_DRAFT,
        title: name,
        ...(description ? { description } : {}),
        ...objectSchema,
      },
    };
  }

  private compileObject(
    fields: unknown,
    extra: unknown,
    path: string,
  ): JsonSchemaObject {
    const properties: Record<string, JsonSchemaObject> = {};
    const required: string[] = [];

    if (!isPlainObject(fields) || Object.keys(fields).length === 0) {
      this.problem(joinPath(path, "fields"), "fields must be a non-empty mapping");
    } else {
      for (const [fieldName, spec] of Object.entries(fields)) {
        const fieldPath = joinPath(path, fieldName);
        const compiled = this.compileField(spec, fieldPath);
        if (!compiled) {
          continue;
        }
        properties[fieldName] = compiled.schema;
        if (!compiled.optional) {
          required.push(fieldName);
        }
      }
    }

    if (extra !== undefined && extra !== "allow" && extra !== "forbid") {
      this.problem(joinPath(path, "extra"), 'extra must be "allow" or "forbid"');
    }

    return {
      type: "object",
      properties,
      ...(required.length > 0 ? { required } : {}),
      additionalProperties: extra !== "forbid",
    };
  }

  private compileField(spec: unknown, path: string): CompiledField | null {
    if (typeof spec === "string") {
      return this.compileShorthand(spec, path);
    }
    if (!isPlainObject(spec)) {
      this.problem(path, "field must be a type name or a mapping");
      return null;
    }

    this.rejectUnknownKeys(spec, FIELD_KEYS, path);

    if (typeof spec.type !== "string") {
      this.problem(path, "type is required");
      return null;
    }
    const shorthand = this.parseShorthand(spec.type, path);
    if (!shorthand) {
      return null;
    }

    const optional = this.readOptional(spec, shorthand.optional, path);
    const baseType: FieldType = shorthand.list ? "array" : shorthand.type;
    const schema: JsonSchemaObject = {};

    if (shorthand.list) {
      const itemSchema = this.compileItems(
        spec.items ?? shorthand.type,
        joinPath(path, "items"),
      );
      if (itemSchema) {
        schema.items = itemSchema;
      }
    } else if (baseType === "array") {
      if (spec.items === undefined) {
        this.problem(path, "array fields must declare items");
      } else {
        const itemSchema = this.compileItems(spec.items, joinPath(path, "items"));
        if (itemSchema) {
          schema.items = itemSchema;
        }
      }
    } else if (spec.items !== undefined) {
      this.problem(joinPath(path, "items"), "items applies only to list fields");
    }

    if (baseType === "object") {
      if (spec.fields !== undefined) {
        Object.assign(schema, this.compileObject(spec.fields, spec.extra, path));
      } else {
        schema.type = "object";
        if (spec.extra !== undefined) {
          this.problem(joinPath(path, "extra"), "extra applies only to objects with fields");
        }
      }
    } else {
      if (spec.fields !== undefined) {
        this.problem(joinPath(path, "fields"), "fields applies only to object fields");
      }
      if (spec.extra !== undefined) {
        this.problem(joinPath(path, "extra"), "extra applies only to object fields");
      }
      schema.type = baseType;
    }

    this.applyConstraints(spec, baseType, schema, path);

    const description = this.readDescription(spec.description, path);
    if (description) {
      schema.description = description;
    }

    if (spec.enum !== undefined) {
      if (!Array.isArray(spec.enum) || spec.enum.length === 0) {
        this.problem(joinPath(path, "enum"), "enum must be a non-empty list");
      } else if (!spec.enum.every((value: unknown) => matchesType(baseType, value))) {
        this.problem(joinPath(path, "enum"), `enum values must be of type ${baseType}`);
      } else {
        schema.enum = [...spec.enum];
      }
    }

    if (spec.default !== undefined) {
      if (spec.default === null ? spec.nullable !== true : !matchesType(baseType, spec.default)) {
        this.problem(joinPath(path, "default"), `default must be of type ${baseType}`);
      } else {
        schema.default = spec.default;
      }
    }

    if (spec.nullable !== undefined && typeof spec.nullable !== "boolean") {
      this.problem(joinPath(path, "nullable"), "nullable must be true or false");
    } else if (spec.nullable === true) {
      schema.type = [schema.type, "null"];
      if (Array.isArray(schema.enum)) {
        schema.enum = [...schema.enum, null];
      }
    }

    return { schema, optional };
  }

  private compileShorthand(spec: string, path: string): CompiledField | null {
    const shorthand = this.parseShorthand(spec, path);
    if (!shorthand) {
      return null;
    }
    if (shorthand.list) {
      return {
        schema: { type: "array", items: { type: shorthand.type } },
        optional: shorthand.optional,
      };
    }
    if (shorthand.type === "array") {
      this.problem(path, 'use "T[]" to declare a list field');
      return null;
    }
    return { schema: { type: shorthand.type }, optional: shorthand.optional };
  }

  private compileItems(spec: unknown, path: string): JsonSchemaObject | null {
    const compiled = this.compileField(spec, path);
    if (compiled?.optional) {
      this.problem(path, "list items cannot be optional");
    }
    return compiled ? compiled.schema : null;
  }

  private parseShorthand(
    text: string,
    path: string,
  ): { type: FieldType; list: boolean; optional: boolean } | null {
    const match = SHORTHAND_PATTERN.exec(text.trim());
    const base = match?.[1];
    if (!match || base === undefined || !isFieldType(base)) {
      this.problem(path, `unknown type "${text}"`);
      return null;
    }
    return {
      type: base,
      list: match[2] !== undefined,
      optional: match[3] !== undefined,
    };
  }

  private readOptional(
    spec: Record<string, unknown>,
    fromShorthand: boolean,
    path: string,
  ): boolean {
    let optional = fromShorthand;
    if (spec.optional !== undefined) {
      if (typeof spec.optional !== "boolean") {
        this.problem(joinPath(path, "optional"), "optional must be true or false");
      } else {
        optional = spec.optional;
      }
    }
    if (spec.required !== undefined) {
      if (typeof spec.required !== "boolean") {
        this.problem(joinPath(path, "required"), "required must be true or false");
      } else {
        optional = !spec.required;
      }
    }
    return optional;
  }

  private applyConstraints(
    spec: Record<string, unknown>,
    type: FieldType,
    schema: JsonSchemaObject,
    path: string,
  ): void {
    for (const key of NUMERIC_KEYS) {
      this.copyNumber(spec, key, schema, path, type === "integer" || type === "number", "integer or number");
    }
    for (const key of STRING_LENGTH_KEYS) {
      this.copyCount(spec, key, schema, path, type === "string", "string");
    }
    for (const key of ARRAY_LENGTH_KEYS) {
      this.copyCount(spec, key, schema, path, type === "array", "list");
    }

    const lower = typeof schema.minimum === "number" ? schema.minimum : undefined;
    const upper = typeof schema.maximum === "number" ? schema.maximum : undefined;
    if (lower !== undefined && upper !== undefined && lower > upper) {
      this.problem(path, "minimum must not exceed maximum");
    }
    this.checkRange(schema, "minLength", "maxLength", path);
    this.checkRange(schema, "minItems", "maxItems", path);

    if (spec.pattern !== undefined) {
      const patternPath = joinPath(path, "pattern");
      if (type !== "string") {
        this.problem(patternPath, "pattern applies only to string fields");
      } else if (typeof spec.pattern !== "string") {
        this.problem(patternPath, "pattern must be a string");
      } else {
        try {
          new RegExp(spec.pattern, "u");
          schema.pattern = spec.pattern;
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          this.problem(patternPath, `pattern does not compile: ${reason}`);
        }
      }
    }
  }

  private copyNumber(
    spec: Record<string, unknown>,
    key: string,
    schema: JsonSchemaObject,
    path: string,
    applies: boolean,
    kind: string,
  ): void {
    const value = spec[key];
    if (value === undefined) {
      return;
    }
    const keyPath = joinPath(path, key);
    if (!applies) {
      this.problem(keyPath, `${key} applies only to ${kind} fields`);
    } else if (typeof value !== "number" || !Number.isFinite(value)) {
      this.problem(keyPath, `${key} must be a number`);
    } else {
      schema[key] = value;
    }
  }

  private copyCount(
    spec: Record<string, unknown>,
    key: string,
    schema: JsonSchemaObject,
    path: string,
    applies: boolean,
    kind: string,
  ): void {
    const value = spec[key];
    if (value === undefined) {
      return;
    }
    const keyPath = joinPath(path, key);
    if (!applies) {
      this.problem(keyPath, `${key} applies only to ${kind} fields`);
    } else if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      this.problem(keyPath, `${key} must be a non-negative integer`);
    } else {
      schema[key] = value;
    }
  }

  private checkRange(
    schema: JsonSchemaObject,
    lowerKey: string,
    upperKey: string,
    path: string,
  ): void {
    const lower = schema[lowerKey];
    const upper = schema[upperKey];
    if (typeof lower === "number" && typeof upper === "number" && lower > upper) {
      this.problem(path, `${lowerKey} must not exceed ${upperKey}`);
    }
  }

  private readDescription(value: unknown, path: string): string | null {
    if (value === undefined || value === null) {
      return null;
    }
    if (typeof value !== "string") {
      this.problem(joinPath(path, "description"), "description must be a string");
      return null;
    }
    return value.trim() || null;
  }

  private rejectUnknownKeys(
    value: Record<string, unknown>,
    allowed: ReadonlySet<string>,
    path: string,
  ): void {
    for (const key of Object.keys(value)) {
      if (!allowed.has(key)) {
        this.problem(joinPath(path, key), `unknown key "${key}"`);
      }
    }
  }
}
