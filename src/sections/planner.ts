// src/sections/planner.ts — Insertion Planner
// Where each missing label goes, with what indentation and text.

import type { Classification, InsertionPlan, LabelRemoval } from "../types.js";
import {
  DEFAULT_LABEL_TEMPLATE,
  NAME_PLACEHOLDER,
  categoriesForSection,
} from "./patterns.js";
import { classifySource, firstDeclarationOf, parseSectionLabel } from "./classifier.js";

export function leadingWhitespace(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : "";
}

export function renderLabel(
  sectionName: string,
  indentation = "",
  template = DEFAULT_LABEL_TEMPLATE,
): string {
  return indentation + template.split(NAME_PLACEHOLDER).join(sectionName);
}

/**
 * A template is usable only if what it renders reads back as the same label;
 * otherwise a second run would not see the sections it inserted.
 */
export function validateLabelTemplate(template: string): string | null {
  if (!template.includes(NAME_PLACEHOLDER)) {
    return `Label template must contain ${NAME_PLACEHOLDER}: "${template}"`;
  }
  const probe = "LIFECYCLE CALLBACKS";
  if (parseSectionLabel(renderLabel(probe, "  ", template)) !== probe) {
    return `Label template does not render a recognizable section label: "${template}"`;
  }
  return null;
}

/**
 * One plan per section with a declaration of one of its categories in `lines`,
 * placed before the earliest such declaration, sorted ascending by line index.
 * Sections with no matching declaration are dropped.
 * Equal indices keep the requested order (Array#sort is stable).
 */
export function planInsertions(
  lines: readonly string[],
  sections: readonly string[],
  template = DEFAULT_LABEL_TEMPLATE,
  classification: Classification = classifySource(lines),
): InsertionPlan[] {
  const plans: InsertionPlan[] = [];
  const seen = new Set<string>();

  for (const section of sections) {
    const sectionName = section.trim().toUpperCase();
    if (seen.has(sectionName)) continue;
    seen.add(sectionName);

    const first = firstDeclarationOf(classification, categoriesForSection(sectionName));
    if (!first) continue;

    const target = lines[first.lineIndex];
    const indentation = leadingWhitespace(target);
    // CRLF files keep their "\r" on each line; the label takes its target's ending.
    const ending = target.endsWith("\r") ? "\r" : "";
    plans.push({
      lineIndex: first.lineIndex,
      sectionName,
      indentation,
      renderedLabelLine: renderLabel(sectionName, indentation, template) + ending,
    });
  }

  return plans.sort((a, b) => a.lineIndex - b.lineIndex);
}

/** Existing labels for the given sections; used by force mode to recreate them. */
export function planRemovals(
  classification: Classification,
  sections: readonly string[],
): LabelRemoval[] {
  const targets = new Set(sections.map((s) => s.trim().toUpperCase()));
  return classification.occurrences
    .filter((o) => targets.has(o.canonicalName))
    .map((o) => ({
      lineIndex: o.lineIndex,
      sectionName: o.canonicalName,
      rawLabelText: o.rawLabelText,
    }));
}
