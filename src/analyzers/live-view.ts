// src/analyzers/live-view.ts — LiveView section labels and component structure

import type { LiveViewSectionsConfig, Violation } from "../types.js";
import { classifyFile, isSectionCandidate, presentSections, splitLines } from "../sections/classifier.js";
import { missingSections } from "../sections/requirements.js";
import { planInsertions } from "../sections/planner.js";
import { COMPONENT_PATTERNS, EXTERNAL_TEMPLATE_PATTERNS } from "../sections/patterns.js";
import { createViolation, formatMissingSections, withDetails } from "../violation.js";

export const MISSING_SECTIONS_TITLE = "LiveView missing labeled sections";
export const EXTERNAL_TEMPLATES_TITLE = "LiveView uses external templates";
export const COMPONENT_STRUCTURE_TITLE = "LiveView component structure issue";

const RULE = "live_view_sections" as const;

/**
 * Run every enabled LiveView check on one file. Files that are not LiveView
 * modules produce no violations.
 */
export function checkLiveView(
  filePath: string,
  content: string,
  config: LiveViewSectionsConfig,
): Violation[] {
  if (!isSectionCandidate(filePath, content)) return [];

  const violations: Violation[] = [];
  if (config.required.length > 0) {
    violations.push(...checkSectionLabels(filePath, content, config));
  }
  if (config.check_external_templates) {
    violations.push(...checkExternalTemplates(filePath, content, config));
  }
  if (config.check_component_structure) {
    violations.push(...checkComponentStructure(filePath, content, config));
  }
  return violations;
}

// ─── Section labels ──────────────────────────────────────────────────────────

/**
 * One aggregated violation naming every applicable section without a label.
 * The violation points at the line where the first missing label belongs.
 */
export function checkSectionLabels(
  filePath: string,
  content: string,
  config: Pick<LiveViewSectionsConfig, "required" | "violation_level">,
): Violation[] {
  const classification = classifyFile(filePath, content);
  const missing = missingSections(
    classification.categories,
    config.required,
    presentSections(classification),
  );
  if (missing.length === 0) return [];

  const [firstPlan] = planInsertions(splitLines(content), missing, undefined, classification);

  return [
    createViolation(withDetails(MISSING_SECTIONS_TITLE, formatMissingSections(missing)), filePath, {
      rule: RULE,
      level: config.violation_level,
      line: firstPlan ? firstPlan.lineIndex + 1 : undefined,
    }),
  ];
}

// ─── External templates ──────────────────────────────────────────────────────

export function usesExternalTemplates(content: string): boolean {
  return EXTERNAL_TEMPLATE_PATTERNS.some((p) => p.test(content));
}

function checkExternalTemplates(
  filePath: string,
  content: string,
  config: LiveViewSectionsConfig,
): Violation[] {
  if (!usesExternalTemplates(content)) return [];
  return [
    createViolation(
      withDetails(
        EXTERNAL_TEMPLATES_TITLE,
        "LiveView components should use embedded HEEx templates instead of external template files",
      ),
      filePath,
      { rule: RULE, level: config.violation_level },
    ),
  ];
}

// ─── Component structure ─────────────────────────────────────────────────────

export function isComponent(content: string): boolean {
  return COMPONENT_PATTERNS.some((p) => p.test(content));
}

function hasDocumentedProps(content: string): boolean {
  if (/@moduledoc.*\{:prop, /.test(content) || /@doc.*\{:prop, /.test(content)) return true;
  const moduledoc = /@moduledoc\s*"""\n([\s\S]*?)"""/.exec(content);
  return moduledoc !== null && /^\s*## Props/m.test(moduledoc[1]);
}

/** Issues found in a LiveComponent module, in report order. */
export function componentStructureIssues(content: string): string[] {
  if (!isComponent(content)) return [];

  const issues: string[] = [];
  const isFunctional = /def\s+render\s*\(\s*assigns\s*\)\s*do\s*~[HLF]/i.test(content);
  const hasUpdateCallback = /@impl\s+true\s+def\s+update\(/.test(content);
  const hasHeex = /~[HLF]"{3}|~[HLF]"/i.test(content);

  if (!hasDocumentedProps(content)) {
    issues.push("Component props are not documented with @moduledoc or @doc");
  }
  if (!isFunctional && !hasUpdateCallback) {
    issues.push("Stateful component missing @impl true def update callback");
  }
  if (!hasHeex) {
    issues.push("Component doesn't use embedded HEEx templates");
  }
  return issues;
}

function checkComponentStructure(
  filePath: string,
  content: string,
  config: LiveViewSectionsConfig,
): Violation[] {
  return componentStructureIssues(content).map((issue) =>
    createViolation(withDetails(COMPONENT_STRUCTURE_TITLE, issue), filePath, {
      rule: RULE,
      level: config.violation_level,
    }),
  );
}
