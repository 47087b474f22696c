import { describe, expect, it } from "vitest";
import type { LintReport } from "../src/definition-linter.service";
import { formatLintResults, isLintOutputFormat } from "../src/lint-format";

const REPORTS: LintReport[] = [
  { id: "analyst", location: "agents/analyst.agent.md", issues: [] },
  {
    id: "critic",
    location: "agents/critic.agent.md",
    issues: [
      { line: 3, message: "Missing required field: model", kind: "schema", severity: "error" },
      { message: 'duplicate section "Notes" ignored', kind: "structure", severity: "warning" },
    ],
  },
];

describe("formatLintResults", () => {
  it("renders a human summary", () => {
    expect(formatLintResults(REPORTS, "human")).toBe(
      [
        "agents/analyst.agent.md: valid",
        "agents/critic.agent.md:",
        "  error [SCHEMA] Line 3: Missing required field: model",
        '  warning [STRUCTURE] duplicate section "Notes" ignored',
        "",
        "Summary:",
        "  Files: 1/2 valid",
        "  Errors: 1",
        "  Warnings: 1",
      ].join("\n"),
    );
  });

  it("counts files with only warnings as valid", () => {
    const [, critic] = REPORTS;
    const warningsOnly: LintReport[] = [
      {
        id: "critic",
        location: critic?.location ?? "",
        issues: [{ message: "w", kind: "structure", severity: "warning" }],
      },
    ];

    expect(formatLintResults(warningsOnly)).toBe(
      [
        "agents/critic.agent.md:",
        "  warning [STRUCTURE] w",
        "",
        "Summary:",
        "  Files: 1/1 valid",
        "  Warnings: 1",
      ].join("\n"),
    );
  });

  it("renders GitHub workflow annotations", () => {
    expect(formatLintResults(REPORTS, "github")).toBe(
      [
        "::error file=agents/critic.agent.md,line=3::Missing required field: model",
        '::warning file=agents/critic.agent.md::duplicate section "Notes" ignored',
      ].join("\n"),
    );
  });

  it("renders JSON keyed by location", () => {
    expect(JSON.parse(formatLintResults(REPORTS, "json"))).toEqual({
      "agents/analyst.agent.md": [],
      "agents/critic.agent.md": [
        {
          line: 3,
          message: "Missing required field: model",
          kind: "schema",
          severity: "error",
        },
        {
          line: null,
          message: 'duplicate section "Notes" ignored',
          kind: "structure",
          severity: "warning",
        },
      ],
    });
  });

  it("recognises output format names", () => {
    expect(isLintOutputFormat("github")).toBe(true);
    expect(isLintOutputFormat("xml")).toBe(false);
  });
});
