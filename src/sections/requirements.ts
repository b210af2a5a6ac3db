// src/sections/requirements.ts — Requirement Resolver
// Which required sections apply to a file, and which of those are missing.

import type { FunctionCategory } from "../types.js";
import { categoriesForSection } from "./patterns.js";

/**
 * Required sections covering at least one category declared in the file.
 * Custom names cover no category and are never applicable. Input order is kept,
 * duplicates are dropped.
 */
export function applicableSections(
  observed: ReadonlySet<FunctionCategory>,
  required: readonly string[],
): string[] {
  const result: string[] = [];
  for (const name of required) {
    const canonical = name.trim().toUpperCase();
    if (!categoriesForSection(canonical).some((c) => observed.has(c))) continue;
    if (!result.includes(canonical)) result.push(canonical);
  }
  return result;
}

/** Applicable sections with no label in the file. What the analyzer reports. */
export function missingSections(
  observed: ReadonlySet<FunctionCategory>,
  required: readonly string[],
  present: ReadonlySet<string>,
): string[] {
  return applicableSections(observed, required).filter((s) => !present.has(s));
}

/** What the fixer should (re)insert: everything applicable under force, else only the missing. */
export function resolveSectionsToInsert(input: {
  observed: ReadonlySet<FunctionCategory>;
  required: readonly string[];
  present: ReadonlySet<string>;
  force: boolean;
}): string[] {
  if (input.force) return applicableSections(input.observed, input.required);
  return missingSections(input.observed, input.required, input.present);
}
