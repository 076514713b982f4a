import { relative } from "node:path";
import type { Diagnostic, LintReport } from "../types/index.js";
import { toPosix } from "../loader/fs.js";

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const GRAY = "\x1b[90m";

export type TextFormatOptions = {
  color?: boolean;
};

export function relativePath(root: string, file: string): string {
  return toPosix(relative(root, file)) || ".";
}

/**
 * Human-readable report grouped by file, with a one-line summary at the end.
 */
export function formatText(report: LintReport, options: TextFormatOptions = {}): string {
  const paint = (code: string, text: string): string =>
    options.color ? `${code}${text}${RESET}` : text;

  if (report.diagnostics.length === 0) {
    return paint(GREEN, "✓ No problems found");
  }

  const lines: string[] = [];
  let currentFile: string | undefined;

  for (const diagnostic of report.diagnostics) {
    if (diagnostic.file !== currentFile) {
      if (currentFile !== undefined) lines.push("");
      currentFile = diagnostic.file;
      lines.push(paint(BOLD, relativePath(report.root, diagnostic.file)));
    }
    lines.push(formatDiagnostic(diagnostic, paint));
  }

  const problems = report.errorCount + report.warningCount;
  lines.push("");
  lines.push(
    paint(
      report.errorCount > 0 ? RED : YELLOW,
      `✗ ${plural(problems, "problem")} (${plural(report.errorCount, "error")}, ${plural(report.warningCount, "warning")})`,
    ),
  );

  return lines.join("\n");
}

function formatDiagnostic(
  diagnostic: Diagnostic,
  paint: (code: string, text: string) => string,
): string {
  const line = String(diagnostic.line ?? "-").padStart(4);
  const severity = paint(
    diagnostic.severity === "error" ? RED : YELLOW,
    diagnostic.severity.padEnd(5),
  );
  return `  ${line}  ${severity}  ${diagnostic.message}  ${paint(GRAY, diagnostic.ruleId)}`;
}

/**
 * The report as pretty JSON, with file paths relative to the root.
 */
export function formatJson(report: LintReport): string {
  return JSON.stringify(
    {
      ...report,
      diagnostics: report.diagnostics.map((d) => ({ ...d, file: relativePath(report.root, d.file) })),
    },
    null,
    2,
  );
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
