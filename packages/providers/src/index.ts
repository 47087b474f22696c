export * from "./anthropic";
export * from "./http-failures";
export * from "./openai_compatible";
export * from "./pricing";
export * from "./provider-factory.service";
export * from "./provider-registry.service";
export * from "./provider-router.service";
export * from "./provider.tokens";
export * from "./providers.module";
export * from "./response-format";
