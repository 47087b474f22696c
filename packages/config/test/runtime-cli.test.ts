import { describe, expect, it } from "vitest";

import {
  CLI_BOOLEAN_OPTIONS_BY_FLAG,
  CLI_VALUE_OPTIONS_BY_FLAG,
  toCliRuntimeOptions,
} from "../src/runtime-cli";

describe("CLI option tables", () => {
  it("indexes flags and aliases by kind", () => {
    expect(CLI_VALUE_OPTIONS_BY_FLAG.get("-m")?.runtimeKey).toBe("model");
    expect(CLI_VALUE_OPTIONS_BY_FLAG.get("--timeout")?.kind).toBe("number");
    expect(CLI_VALUE_OPTIONS_BY_FLAG.has("--help")).toBe(false);
    expect(CLI_BOOLEAN_OPTIONS_BY_FLAG.get("-h")?.runtimeKey).toBe("help");
  });
});

describe("toCliRuntimeOptions", () => {
  it("keeps the configuration-level options", () => {
    expect(
      toCliRuntimeOptions({
        config: "agentmd.config.yaml",
        logLevel: "WARN",
        agentsDir: ["defs,shared", " extra "],
        timeoutMs: "5000",
        model: ["alpha", "beta"],
        query: "ignored",
      }),
    ).toEqual({
      config: "agentmd.config.yaml",
      logLevel: "warn",
      agentsDir: ["defs", "shared", "extra"],
      timeoutMs: 5000,
      model: "beta",
    });
  });

  it("drops values it cannot interpret", () => {
    expect(toCliRuntimeOptions({ logLevel: "loud", timeoutMs: "-1", fragmentsDir: " , " })).toEqual(
      {},
    );
  });
});
