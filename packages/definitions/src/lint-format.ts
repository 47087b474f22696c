import { hasErrors, type LintIssue, type LintReport } from "./definition-linter.service";

export type LintOutputFormat = "human" | "json" | "github";

export const LINT_OUTPUT_FORMATS: readonly LintOutputFormat[] = ["human", "json", "github"];

export const isLintOutputFormat = (value: string): value is LintOutputFormat =>
  LINT_OUTPUT_FORMATS.some((format) => format === value);

const describeIssue = (issue: LintIssue): string => {
  const line = issue.line !== undefined ? `Line ${issue.line}: ` : "";
  return `${issue.severity} [${issue.kind.toUpperCase()}] ${line}${issue.message}`;
};

const formatJson = (reports: readonly LintReport[]): string =>
  JSON.stringify(
    Object.fromEntries(
      reports.map((report) => [
        report.location,
        report.issues.map((issue) => ({
          line: issue.line ?? null,
          message: issue.message,
          kind: issue.kind,
          severity: issue.severity,
        })),
      ]),
    ),
    null,
    2,
  );

const formatGithub = (reports: readonly LintReport[]): string =>
  reports
    .flatMap((report) =>
      report.issues.map((issue) => {
        const line = issue.line !== undefined ? `,line=${issue.line}` : "";
        return `::${issue.severity} file=${report.location}${line}::${issue.message}`;
      }),
    )
    .join("\n");

const formatHuman = (reports: readonly LintReport[]): string => {
  const lines: string[] = [];
  let errors = 0;
  let warnings = 0;

  for (const report of reports) {
    if (report.issues.length === 0) {
      lines.push(`${report.location}: valid`);
      continue;
    }
    lines.push(`${report.location}:`);
    for (const issue of report.issues) {
      lines.push(`  ${describeIssue(issue)}`);
      if (issue.severity === "error") {
        errors += 1;
      } else {
        warnings += 1;
      }
    }
  }

  const valid = reports.filter((report) => !hasErrors(report)).length;
  lines.push("", "Summary:", `  Files: ${valid}/${reports.length} valid`);
  if (errors > 0) {
    lines.push(`  Errors: ${errors}`);
  }
  if (warnings > 0) {
    lines.push(`  Warnings: ${warnings}`);
  }
  return lines.join("\n");
};

/**
 * Renders lint reports for terminals (`human`), tooling (`json`) or CI
 * annotations (`github`).
 */
export const formatLintResults = (
  reports: readonly LintReport[],
  format: LintOutputFormat = "human",
): string => {
  switch (format) {
    case "json":
      return formatJson(reports);
    case "github":
      return formatGithub(reports);
    case "human":
      return formatHuman(reports);
  }
};
