// src/autofix.ts — --fix flow
// Turns missing-sections violations into file edits (or previews). All file
// I/O for fixing lives here; the section fixer itself is pure.

import { writeFileSync } from "node:fs";
import { relative, resolve } from "node:path";
import type { ResolvedConfig, Warning } from "./types.js";
import type { AuditRun } from "./runner.js";
import { readSource, runAudit } from "./runner.js";
import { MISSING_SECTIONS_TITLE } from "./analyzers/live-view.js";
import { isSectionCandidate } from "./sections/classifier.js";
import { fixSections } from "./sections/fixer.js";
import { extractMissingSections } from "./violation.js";

export interface FixTarget {
  file: string; // absolute
  displayPath: string;
  sections: string[];
}

export type FixStatus = "fixed" | "previewed" | "unchanged" | "failed";

export interface FixOutcome {
  file: string;
  status: FixStatus;
  sections: string[];
  message?: string;
  preview?: string;
}

export interface AutoFixOptions {
  preview?: boolean;
  force?: boolean;
}

/**
 * Files to fix. Normally those with a missing-sections violation, using the
 * sections named in the message. With force, every LiveView file in the run
 * with the configured required list.
 */
export function collectFixTargets(
  config: ResolvedConfig,
  run: AuditRun,
  force: boolean,
  warnings: Warning[] = [],
): FixTarget[] {
  if (force) {
    const targets: FixTarget[] = [];
    for (const file of run.files) {
      const content = readSource(file, warnings);
      const displayPath = relative(config.rootDir, file) || file;
      if (content === null || !isSectionCandidate(displayPath, content)) continue;
      targets.push({ file, displayPath, sections: [...config.rules.live_view_sections.required] });
    }
    return targets;
  }

  return run.violations
    .filter((v) => v.rule === "live_view_sections" && v.message.startsWith(MISSING_SECTIONS_TITLE))
    .map((v) => ({
      file: resolve(config.rootDir, v.file),
      displayPath: v.file,
      sections: extractMissingSections(v.message),
    }))
    .filter((t) => t.sections.length > 0);
}

export function runFixes(
  config: ResolvedConfig,
  run: AuditRun,
  options: AutoFixOptions = {},
  warnings: Warning[] = [],
): FixOutcome[] {
  const force = options.force ?? false;
  const outcomes: FixOutcome[] = [];

  for (const target of collectFixTargets(config, run, force, warnings)) {
    const content = readSource(target.file, warnings);
    if (content === null) {
      outcomes.push({ file: target.displayPath, status: "failed", sections: target.sections, message: "File could not be read" });
      continue;
    }

    const result = fixSections(content, target.sections, {
      force,
      preview: options.preview,
      filePath: target.displayPath,
      labelTemplate: config.rules.live_view_sections.label_template,
    });

    switch (result.kind) {
      case "preview":
        outcomes.push({
          file: target.displayPath,
          status: result.changed ? "previewed" : "unchanged",
          sections: target.sections,
          preview: result.preview,
        });
        break;
      case "fixed":
        outcomes.push(writeFixed(target, result.content, result.inserted, warnings));
        break;
      case "nothing-to-fix":
        outcomes.push({ file: target.displayPath, status: "unchanged", sections: target.sections, message: result.message });
        break;
      case "invalid-template":
        outcomes.push({ file: target.displayPath, status: "failed", sections: target.sections, message: result.message });
        break;
    }
  }

  return outcomes;
}

/**
 * Apply fixes, then audit the same files again when anything was rewritten so
 * the returned run reflects the files on disk. Both passes report into
 * `warnings`.
 */
export function fixAndReaudit(
  config: ResolvedConfig,
  run: AuditRun,
  options: AutoFixOptions & { only?: readonly string[]; verbose?: boolean } = {},
  warnings: Warning[] = [],
): { outcomes: FixOutcome[]; run: AuditRun } {
  const outcomes = runFixes(config, run, options, warnings);
  if (!outcomes.some((o) => o.status === "fixed")) return { outcomes, run };
  const rerun = runAudit(config, { files: run.files, only: options.only, verbose: options.verbose }, warnings);
  return { outcomes, run: rerun };
}

function writeFixed(target: FixTarget, content: string, inserted: string[], warnings: Warning[]): FixOutcome {
  try {
    writeFileSync(target.file, content);
    return { file: target.displayPath, status: "fixed", sections: inserted };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "error", module: "autofix", message: `Cannot write file: ${msg}`, file: target.file });
    return { file: target.displayPath, status: "failed", sections: inserted, message: msg };
  }
}

export function formatFixOutcome(outcome: FixOutcome): string {
  switch (outcome.status) {
    case "fixed":
      return `Fixed ${outcome.file}: added ${outcome.sections.join(", ")}`;
    case "previewed":
      return `File: ${outcome.file}\n${outcome.preview ?? ""}`;
    case "unchanged":
      return `Skipped ${outcome.file}: ${outcome.message ?? outcome.preview ?? "nothing to change"}`;
    case "failed":
      return `Could not fix ${outcome.file}: ${outcome.message ?? "unknown error"}`;
  }
}
