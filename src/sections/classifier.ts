// src/sections/classifier.ts — Section Classifier
// Single pass over the lines: tags declarations with a category and comment
// lines that match the label grammar with the section they name.

import { extname } from "node:path";
import type {
  Classification,
  Declaration,
  FunctionCategory,
  LineClass,
  SectionOccurrence,
} from "../types.js";
import { SOURCE_EXTENSIONS } from "../types.js";
import {
  DECLARATION_PATTERN,
  LIVE_MODULE_PATTERNS,
  SECTION_LABEL_PATTERN,
  WEB_ENTRY_FILE,
  categoryForName,
} from "./patterns.js";

export function emptyClassification(): Classification {
  return { declarations: [], occurrences: [], categories: new Set() };
}

export function splitLines(content: string): string[] {
  return content.split("\n");
}

/**
 * Canonical section name encoded by a label line, or null when the line is
 * not a label (prose, markup, or code that merely mentions one).
 */
export function parseSectionLabel(line: string): string | null {
  const match = SECTION_LABEL_PATTERN.exec(line);
  return match ? match[1].trim() : null;
}

/** Label test runs first; a line is never both a label and a declaration. */
export function classifyLine(line: string): LineClass {
  const label = parseSectionLabel(line);
  if (label !== null) return { kind: "label", name: label };

  const decl = DECLARATION_PATTERN.exec(line);
  if (decl) {
    const name = decl[1];
    return { kind: "declaration", name, category: categoryForName(name) };
  }

  return { kind: "code" };
}

export function classifySource(lines: readonly string[]): Classification {
  const declarations: Declaration[] = [];
  const occurrences: SectionOccurrence[] = [];
  const categories = new Set<FunctionCategory>();

  lines.forEach((line, lineIndex) => {
    const cls = classifyLine(line);
    if (cls.kind === "label") {
      occurrences.push({ lineIndex, rawLabelText: line, canonicalName: cls.name });
    } else if (cls.kind === "declaration") {
      declarations.push({ lineIndex, name: cls.name, category: cls.category });
      categories.add(cls.category);
    }
  });

  return { declarations, occurrences, categories };
}

export function isSourceFile(filePath: string): boolean {
  return SOURCE_EXTENSIONS.test(extname(filePath));
}

export function isWebEntryFile(filePath: string): boolean {
  return WEB_ENTRY_FILE.test(filePath.replace(/\\/g, "/"));
}

export function isLiveModule(content: string): boolean {
  return LIVE_MODULE_PATTERNS.some((p) => p.test(content));
}

/** Cheap gate run before classification; callers invoke the classifier opportunistically. */
export function isSectionCandidate(filePath: string, content: string): boolean {
  return isSourceFile(filePath) && !isWebEntryFile(filePath) && isLiveModule(content);
}

/**
 * Classify a file's content. Non-candidates (wrong extension, the web entry
 * module, or no LiveView markers) yield an empty classification.
 */
export function classifyFile(filePath: string, content: string): Classification {
  if (!isSectionCandidate(filePath, content)) return emptyClassification();
  return classifySource(splitLines(content));
}

export function presentSections(classification: Classification): Set<string> {
  return new Set(classification.occurrences.map((o) => o.canonicalName));
}

/** Earliest declaration belonging to any of `categories`. */
export function firstDeclarationOf(
  classification: Classification,
  categories: readonly FunctionCategory[],
): Declaration | undefined {
  return classification.declarations.find((d) => categories.includes(d.category));
}
