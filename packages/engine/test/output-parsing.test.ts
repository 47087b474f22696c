import { describe, expect, it } from "vitest";
import { ValidationFailureError } from "@agentmd/types";
import { parseJsonOutput, stripJsonFence } from "../src/execution/output-parsing";

describe("stripJsonFence", () => {
  it("unwraps a json fence around the whole response", () => {
    expect(stripJsonFence('  ```json\n{"a": 1}\n```  ')).toBe('{"a": 1}');
  });

  it("unwraps an untagged fence", () => {
    expect(stripJsonFence('```\n[1, 2]\n```')).toBe("[1, 2]");
  });

  it("leaves text without a surrounding fence alone", () => {
    expect(stripJsonFence('Here: ```json\n{}\n```')).toBe('Here: ```json\n{}\n```');
  });
});

describe("parseJsonOutput", () => {
  it("parses fenced JSON", () => {
    expect(parseJsonOutput('```JSON\n{"ok": true}\n```', "Result")).toEqual({ ok: true });
  });

  it("reports text that is not JSON at the root", () => {
    let failure: unknown;
    try {
      parseJsonOutput("not json", "Result");
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(ValidationFailureError);
    expect(failure).toMatchObject({
      schemaName: "Result",
      problems: [{ field: "$", code: "unparseable" }],
    });
  });
});
