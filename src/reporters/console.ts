// src/reporters/console.ts — Human-readable report

import type { Violation } from "../types.js";
import { ENGINE_VERSION } from "../types.js";
import { violationSummary } from "../violation.js";

export interface ConsoleReportOptions {
  verbose?: boolean;
  details?: boolean;
}

const LEVEL_ORDER = { error: 0, warning: 1 } as const;

export function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort(
    (a, b) =>
      LEVEL_ORDER[a.level] - LEVEL_ORDER[b.level] ||
      a.file.localeCompare(b.file) ||
      (a.line ?? 0) - (b.line ?? 0),
  );
}

export function formatViolation(violation: Violation, options: ConsoleReportOptions = {}): string {
  const tag = violation.level === "error" ? "ERROR" : "WARNING";
  const location = violation.line !== undefined ? `${violation.file}:${violation.line}` : violation.file;
  const lines = [`${tag}: ${violation.message}`, `   File: ${location}`];
  if (options.verbose || options.details) lines.push(`   Rule: ${violation.rule}`);
  return lines.join("\n");
}

export function renderConsoleReport(
  violations: readonly Violation[],
  options: ConsoleReportOptions = {},
): string {
  const summary = violationSummary(violations);
  const out: string[] = [`live-audit v${ENGINE_VERSION}`, ""];

  for (const v of sortViolations(violations)) {
    out.push(formatViolation(v, options), "");
  }

  out.push(
    "Summary:",
    `  ${summary.errors} errors`,
    `  ${summary.warnings} warnings`,
    `  ${summary.total} violations found in total`,
  );

  if (summary.total > 0 && !options.details) {
    out.push("", "Run with --details to include the rule behind each violation.");
  }

  return out.join("\n") + "\n";
}
