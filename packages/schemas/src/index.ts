export * from "./declaration";
export * from "./schema-compiler.service";
export * from "./schema-handle.cache";
export * from "./schemas.module";
export { ROOT_FIELD, toFieldProblems } from "./validation-errors";
