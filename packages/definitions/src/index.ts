export * from "./definition-catalog.service";
export * from "./definition-linter.service";
export * from "./definition-parser.service";
export * from "./definition-summary";
export * from "./definitions.module";
export * from "./definitions.tokens";
export * from "./document-source";
export * from "./lint-format";
export { matchFenceOpening, normalizeLabel } from "./markdown-scanner";
