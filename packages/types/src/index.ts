export * from "./definitions";
export * from "./providers";
export * from "./execution";
export * from "./errors";
