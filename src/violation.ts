// src/violation.ts — Violation model shared by every rule

import type { RuleName, Violation, ViolationLevel, ViolationSummary } from "./types.js";

export function createViolation(
  message: string,
  file: string,
  opts: { rule: RuleName; level?: ViolationLevel; line?: number },
): Violation {
  return Object.freeze({
    message,
    file,
    ...(opts.line !== undefined ? { line: opts.line } : {}),
    level: opts.level ?? "warning",
    rule: opts.rule,
  });
}

/** Title line plus an indented details block, the shape reporters print. */
export function withDetails(title: string, ...details: string[]): string {
  return [title, ...details.map((d) => `   ${d}`)].join("\n");
}

export function isError(violation: Violation): boolean {
  return violation.level === "error";
}

export function hasErrors(violations: readonly Violation[]): boolean {
  return violations.some(isError);
}

export function violationSummary(violations: readonly Violation[]): ViolationSummary {
  const errors = violations.filter(isError).length;
  const warnings = violations.length - errors;
  return { errors, warnings, total: errors + warnings };
}

// ─── Missing-sections wire shape ─────────────────────────────────────────────
// Downstream tooling greps `Missing sections: ["A", "B"]` out of the message.

export function formatMissingSections(sections: readonly string[]): string {
  return `Missing sections: [${sections.map((s) => `"${s}"`).join(", ")}]`;
}

const MISSING_SECTIONS_PATTERN = /Missing sections: \[(.*?)\]/;

export function extractMissingSections(message: string): string[] {
  const match = MISSING_SECTIONS_PATTERN.exec(message);
  if (!match) return [];
  return match[1]
    .split(",")
    .map((s) => s.trim().replace(/^"/, "").replace(/"$/, ""))
    .filter((s) => s.length > 0);
}
