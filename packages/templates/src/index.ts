export * from "./fragment-registry";
export * from "./fragment-registry.loader";
export * from "./template-renderer.service";
export * from "./template.module";
