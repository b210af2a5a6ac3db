// src/sections/patcher.ts — Patch Applier
// Applies an insertion plan to a line sequence, or renders it as a preview.
// Both modes consume the same plan; the preview never recomputes positions.

import type { InsertionPlan, LabelRemoval } from "../types.js";

export const PREVIEW_CONTEXT_LINES = 3;
export const PREVIEW_HEADER = "Preview changes:";

/** A plan pointing outside the text is a planner bug, not an input condition. */
export class PlanInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanInvariantError";
  }
}

function assertInBounds(lineIndex: number, length: number, what: string): void {
  if (!Number.isInteger(lineIndex) || lineIndex < 0 || lineIndex >= length) {
    throw new PlanInvariantError(
      `${what} line index ${lineIndex} is outside the text bounds [0, ${length})`,
    );
  }
}

function byLineIndex<T extends { lineIndex: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => a.lineIndex - b.lineIndex);
}

/**
 * Insert each label immediately before its target line. Plans are applied
 * highest index first, so every stored index still refers to the original
 * line when its turn comes: an insertion only shifts lines at or after its
 * own index, and all remaining plans target lower indices.
 * Equal indices end up in plan order. The input array is not mutated.
 */
export function applyInsertionsDescending(
  lines: readonly string[],
  plans: readonly InsertionPlan[],
): string[] {
  for (const plan of plans) assertInBounds(plan.lineIndex, lines.length, `Insertion for ${plan.sectionName}`);

  const result = [...lines];
  const ordered = byLineIndex(plans);
  for (let i = ordered.length - 1; i >= 0; i--) {
    const plan = ordered[i];
    result.splice(plan.lineIndex, 0, plan.renderedLabelLine);
  }
  return result;
}

/**
 * Remove label lines (original indices) from text that already had `plans`
 * applied. Each removal index is shifted by the insertions at or before it.
 */
export function applyRemovalsAfterInsertions(
  insertedLines: readonly string[],
  originalLength: number,
  plans: readonly InsertionPlan[],
  removals: readonly LabelRemoval[],
): string[] {
  for (const removal of removals) assertInBounds(removal.lineIndex, originalLength, `Removal of ${removal.sectionName}`);

  const shifted = removals
    .map((r) => r.lineIndex + plans.filter((p) => p.lineIndex <= r.lineIndex).length)
    .sort((a, b) => b - a);

  const result = [...insertedLines];
  for (const index of shifted) result.splice(index, 1);
  return result;
}

/** 1-based line number a planned label will have once all edits are applied. */
export function postEditLineNumber(
  plans: readonly InsertionPlan[],
  removals: readonly LabelRemoval[],
  planPosition: number,
): number {
  const ordered = byLineIndex(plans);
  const plan = ordered[planPosition];
  const removedBefore = removals.filter((r) => r.lineIndex < plan.lineIndex).length;
  return plan.lineIndex + 1 + planPosition - removedBefore;
}

function display(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

function contextLines(lines: readonly string[], from: number, to: number): string[] {
  const out: string[] = [];
  for (let i = Math.max(0, from); i <= Math.min(lines.length - 1, to); i++) {
    out.push(`  ${i + 1}: ${display(lines[i])}`);
  }
  return out;
}

interface PreviewBlock {
  lineIndex: number;
  text: string;
}

/**
 * Diff-style rendering of a plan against the original lines. Context lines
 * carry original line numbers; each inserted label carries its post-edit
 * line number. Blocks are in ascending line order.
 */
export function renderPreview(
  lines: readonly string[],
  plans: readonly InsertionPlan[],
  options: { filePath?: string; removals?: readonly LabelRemoval[] } = {},
): string {
  const removals = byLineIndex(options.removals ?? []);
  const ordered = byLineIndex(plans);
  for (const plan of ordered) assertInBounds(plan.lineIndex, lines.length, `Insertion for ${plan.sectionName}`);
  for (const removal of removals) assertInBounds(removal.lineIndex, lines.length, `Removal of ${removal.sectionName}`);

  const blocks: PreviewBlock[] = [];

  for (const removal of removals) {
    const lineNum = removal.lineIndex + 1;
    blocks.push({
      lineIndex: removal.lineIndex,
      text: [`## Remove ${removal.sectionName} at line ${lineNum}:`, `- ${lineNum}: ${display(lines[removal.lineIndex])}`].join("\n"),
    });
  }

  ordered.forEach((plan, position) => {
    const lineNum = postEditLineNumber(ordered, removals, position);
    const body = [
      ...contextLines(lines, plan.lineIndex - PREVIEW_CONTEXT_LINES, plan.lineIndex - 1),
      `+ ${lineNum}: ${display(plan.renderedLabelLine)}`,
      ...(options.filePath ? [`  ${options.filePath}:${lineNum}`] : []),
      ...contextLines(lines, plan.lineIndex, plan.lineIndex + PREVIEW_CONTEXT_LINES - 1),
    ];
    blocks.push({
      lineIndex: plan.lineIndex,
      text: [`## Insert ${plan.sectionName} at line ${lineNum}:`, ...body].join("\n"),
    });
  });

  const sorted = byLineIndex(blocks);
  return [PREVIEW_HEADER, ...sorted.map((b) => `\n${b.text}`)].join("\n");
}
