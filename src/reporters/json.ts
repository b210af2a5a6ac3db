// src/reporters/json.ts — Machine-readable report

import type { Violation, ViolationSummary } from "../types.js";
import { violationSummary } from "../violation.js";

export interface JsonReport {
  summary: ViolationSummary;
  violations: {
    message: string;
    file: string;
    line: number | null;
    level: Violation["level"];
    rule: Violation["rule"];
  }[];
}

export function buildJsonReport(violations: readonly Violation[]): JsonReport {
  return {
    summary: violationSummary(violations),
    violations: violations.map((v) => ({
      message: v.message,
      file: v.file,
      line: v.line ?? null,
      level: v.level,
      rule: v.rule,
    })),
  };
}

export function renderJsonReport(violations: readonly Violation[]): string {
  return JSON.stringify(buildJsonReport(violations), null, 2) + "\n";
}
