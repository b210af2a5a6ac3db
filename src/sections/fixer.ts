// src/sections/fixer.ts — Section fixer
// Classifier → Requirement Resolver → Insertion Planner → Patch Applier.
//
// Force mode recreates labels in place: existing labels for the sections being
// inserted are removed and a canonical label goes before the first declaration
// of each category, so every such section ends up labeled exactly once.

import type { FixOptions, FixResult } from "../types.js";
import { classifySource, presentSections, splitLines } from "./classifier.js";
import { resolveSectionsToInsert } from "./requirements.js";
import { planInsertions, planRemovals, validateLabelTemplate } from "./planner.js";
import {
  applyInsertionsDescending,
  applyRemovalsAfterInsertions,
  renderPreview,
} from "./patcher.js";
import { DEFAULT_LABEL_TEMPLATE } from "./patterns.js";

export const NOTHING_TO_FIX_MESSAGE =
  "All required sections already exist. Use --force to recreate them.";
export const NOTHING_TO_RECREATE_MESSAGE =
  "None of the requested sections has a matching function in this file.";
export const NO_CHANGES_PREVIEW = "No changes needed - all required sections already exist.";

/**
 * Insert the missing section labels into `content`, or preview the insertion.
 *
 * Returns `nothing-to-fix` when there is nothing to insert (a preview request
 * returns an explanatory preview instead), and `invalid-template` when the
 * label template would not read back as a label.
 */
export function fixSections(
  content: string,
  sections: readonly string[],
  options: FixOptions = {},
): FixResult {
  const force = options.force ?? false;
  const template = options.labelTemplate ?? DEFAULT_LABEL_TEMPLATE;

  const templateError = validateLabelTemplate(template);
  if (templateError) {
    return { ok: false, kind: "invalid-template", message: templateError };
  }

  const lines = splitLines(content);
  const classification = classifySource(lines);

  const toInsert = resolveSectionsToInsert({
    observed: classification.categories,
    required: sections,
    present: presentSections(classification),
    force,
  });

  const plans = planInsertions(lines, toInsert, template, classification);
  const removals = force
    ? planRemovals(classification, plans.map((p) => p.sectionName))
    : [];

  if (plans.length === 0) {
    if (options.preview) {
      return { ok: true, kind: "preview", preview: NO_CHANGES_PREVIEW, changed: false };
    }
    return {
      ok: false,
      kind: "nothing-to-fix",
      message: force ? NOTHING_TO_RECREATE_MESSAGE : NOTHING_TO_FIX_MESSAGE,
    };
  }

  if (options.preview) {
    return {
      ok: true,
      kind: "preview",
      preview: renderPreview(lines, plans, { filePath: options.filePath, removals }),
      changed: true,
    };
  }

  const inserted = applyInsertionsDescending(lines, plans);
  const fixed = applyRemovalsAfterInsertions(inserted, lines.length, plans, removals);

  return {
    ok: true,
    kind: "fixed",
    content: fixed.join("\n"),
    inserted: plans.map((p) => p.sectionName),
    removed: removals.length,
  };
}
