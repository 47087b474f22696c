export * from "./config.module";
export * from "./config.service";
export * from "./config.store";
export * from "./config.const";
export * from "./config.namespace";
export * from "./config-path";
export * from "./defaults";
export * from "./migrations";
export * from "./runtime-env";
export * from "./types";
export * from "./validation/config-validator";
export * from "./runtime-cli";
