// src/runner.ts — Audit runner
// Reads each file once and hands its content to every enabled rule.

import { readFileSync } from "node:fs";
import { relative, resolve } from "node:path";
import type { ResolvedConfig, Violation, Warning } from "./types.js";
import { discoverFiles } from "./file-discovery.js";
import { enabledRules } from "./rules.js";

export interface AuditRun {
  files: string[];
  violations: Violation[];
}

/** Verbose logger — writes to stderr only when verbose is enabled. */
export function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export function readSource(filePath: string, warnings: Warning[]): string | null {
  try {
    return readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "runner", message: `Cannot read file: ${msg}`, file: filePath });
    return null;
  }
}

/**
 * Audit `files`, or everything discovered from the config's scan paths when
 * none are given. Violations carry paths relative to the root directory.
 */
export function runAudit(
  config: ResolvedConfig,
  opts: { files?: string[]; only?: readonly string[]; verbose?: boolean } = {},
  warnings: Warning[] = [],
): AuditRun {
  const verbose = opts.verbose ?? false;
  const files =
    opts.files && opts.files.length > 0
      ? opts.files.map((f) => resolve(config.rootDir, f))
      : discoverFiles(config.rootDir, config.scan_paths, config.excluded_paths, warnings);

  const rules = enabledRules(config, opts.only);
  vlog(verbose, `Auditing ${files.length} file(s) with ${rules.length} rule(s): ${rules.map((r) => r.name).join(", ")}`);

  const violations: Violation[] = [];
  for (const file of files) {
    const content = readSource(file, warnings);
    if (content === null) continue;
    const displayPath = relative(config.rootDir, file) || file;
    for (const rule of rules) {
      violations.push(...rule.check(displayPath, content, config.rules));
    }
  }

  vlog(verbose, `Found ${violations.length} violation(s)`);
  return { files, violations };
}
