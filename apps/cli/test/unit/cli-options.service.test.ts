import { describe, expect, it } from "vitest";
import { CliOptionsService } from "../../src/cli/cli-options.service";
import { CliParseError } from "../../src/cli/cli-parser.service";

describe("CliOptionsService", () => {
  const service = new CliOptionsService();

  it("reads the last value of repeated string options", () => {
    expect(service.string({ model: ["alpha", "beta"] }, "model")).toBe("beta");
    expect(service.string({ model: "" }, "model")).toBeUndefined();
    expect(service.string({}, "model")).toBeUndefined();
  });

  it("parses numbers and reports invalid ones", () => {
    expect(service.number({ temperature: "0.4" }, "temperature")).toBe(0.4);
    expect(service.number({}, "temperature")).toBeUndefined();
    expect(() => service.number({ timeoutMs: "soon" }, "timeoutMs")).toThrow(
      new CliParseError('Option timeoutMs must be a number, got "soon".'),
    );
  });

  it("parses the JSON context", () => {
    expect(service.context({ context: '{"team":"core","n":2}' })).toEqual({
      team: "core",
      n: 2,
    });
    expect(service.context({})).toEqual({});
    expect(() => service.context({ context: "[1,2]" })).toThrow(
      "The --context value must be a JSON object.",
    );
    expect(() => service.context({ context: "{" })).toThrow(/^Invalid JSON context: /);
  });

  it("validates the lint format", () => {
    expect(service.lintFormat({})).toBe("human");
    expect(service.lintFormat({ format: "github" })).toBe("github");
    expect(() => service.lintFormat({ format: "xml" })).toThrow(
      'Unknown format "xml"; expected human, json or github.',
    );
  });

  it("derives configuration overrides", () => {
    expect(
      service.runtime({ config: "custom.yaml", logLevel: "debug", query: "ignored" }),
    ).toEqual({ config: "custom.yaml", logLevel: "debug" });
  });
});
