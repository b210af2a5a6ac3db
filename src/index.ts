// src/index.ts — Library API
// audit() for whole projects, fixSections() for single files, and the
// classifier/planner/patcher stages for callers that need them separately.

import type { ResolvedConfig, Violation, Warning } from "./types.js";
import { loadConfig } from "./config.js";
import type { LoadConfigOptions } from "./config.js";
import { runAudit } from "./runner.js";

export { fixSections, NOTHING_TO_FIX_MESSAGE, NO_CHANGES_PREVIEW } from "./sections/fixer.js";
export {
  classifyFile,
  classifyLine,
  classifySource,
  isSectionCandidate,
  parseSectionLabel,
  presentSections,
  splitLines,
} from "./sections/classifier.js";
export { applicableSections, missingSections, resolveSectionsToInsert } from "./sections/requirements.js";
export { planInsertions, planRemovals, renderLabel, validateLabelTemplate } from "./sections/planner.js";
export {
  applyInsertionsDescending,
  applyRemovalsAfterInsertions,
  renderPreview,
  PlanInvariantError,
} from "./sections/patcher.js";
export {
  CATEGORY_RULES,
  DEFAULT_LABEL_TEMPLATE,
  DEFAULT_REQUIRED_SECTIONS,
  categoriesForSection,
  sectionForCategory,
} from "./sections/patterns.js";
export { checkLiveView, checkSectionLabels } from "./analyzers/live-view.js";
export { checkFileSize } from "./analyzers/file-size.js";
export { ALL_RULES, enabledRules, findRule } from "./rules.js";
export type { Rule } from "./rules.js";
export { loadConfig, defaultConfig, applyLayer } from "./config.js";
export type { LoadConfigOptions } from "./config.js";
export { runAudit } from "./runner.js";
export type { AuditRun } from "./runner.js";
export { runFixes, collectFixTargets, fixAndReaudit } from "./autofix.js";
export type { FixOutcome, FixTarget } from "./autofix.js";
export {
  createViolation,
  extractMissingSections,
  formatMissingSections,
  hasErrors,
  violationSummary,
} from "./violation.js";
export { renderConsoleReport } from "./reporters/console.js";
export { renderJsonReport } from "./reporters/json.js";

export type {
  Classification,
  Declaration,
  FileSizeConfig,
  FixOptions,
  FixResult,
  FunctionCategory,
  InsertionPlan,
  LabelRemoval,
  LineClass,
  LiveViewSectionsConfig,
  ResolvedConfig,
  RuleName,
  SectionOccurrence,
  Violation,
  ViolationLevel,
  ViolationSummary,
  Warning,
} from "./types.js";
export { ENGINE_VERSION } from "./types.js";

/**
 * Load config for `rootDir` and audit it. Config warnings and unreadable files
 * are returned alongside the violations rather than thrown.
 */
export function audit(
  options: LoadConfigOptions & { files?: string[]; only?: string[] } = {},
): { config: ResolvedConfig; violations: Violation[]; warnings: Warning[] } {
  const warnings: Warning[] = [];
  const config = loadConfig(options, warnings);
  const { violations } = runAudit(config, { files: options.files, only: options.only }, warnings);
  return { config, violations, warnings };
}
