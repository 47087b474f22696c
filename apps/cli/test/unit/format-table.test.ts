import { describe, expect, it } from "vitest";
import { formatTable, truncate } from "../../src/cli/format-table";

describe("truncate", () => {
  it("cuts long text and marks the cut", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
    expect(truncate("abc", 3)).toBe("abc");
  });
});

describe("formatTable", () => {
  it("pads every column to its widest cell", () => {
    expect(
      formatTable(
        ["Name", "Model"],
        [
          ["reviewer", "alpha"],
          ["qa", "beta-large"],
        ],
      ),
    ).toBe(["Name      Model", "reviewer  alpha", "qa        beta-large"].join("\n"));
  });
});
