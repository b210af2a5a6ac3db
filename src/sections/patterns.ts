// src/sections/patterns.ts — Pattern Registry
// Ordered category rules, the section-label grammar and the LiveView module heuristic.

import type { FunctionCategory } from "../types.js";

// ─── Category rules ──────────────────────────────────────────────────────────

export interface CategoryRule {
  category: Exclude<FunctionCategory, "other">;
  section: string;
  names: readonly string[];
}

/**
 * Priority order is array order. A declaration name is assigned to the first
 * rule that lists it; names not listed anywhere fall through to "other".
 * Several categories may share a section: `handle_info` is an event handler
 * for labeling purposes.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: "lifecycle",
    section: "LIFECYCLE CALLBACKS",
    names: ["mount", "update", "init", "terminate", "on_mount", "handle_params", "handle_continue"],
  },
  {
    category: "event",
    section: "EVENT HANDLERS",
    names: ["handle_event", "handle_call", "handle_cast"],
  },
  {
    category: "info",
    section: "EVENT HANDLERS",
    names: ["handle_info"],
  },
  {
    category: "rendering",
    section: "RENDERING",
    names: ["render", "component", "page_title"],
  },
];

/** `def`/`defp` at line start (after indentation), capturing the function name. */
export const DECLARATION_PATTERN = /^\s*defp?\s+([A-Za-z0-9_?!]+)/;

/**
 * A whole-line section label: `#`, optional filler, an uppercase phrase whose
 * first and last characters are letters, optional filler, nothing else.
 *   # LIFECYCLE CALLBACKS
 *   # ---------- EVENT HANDLERS ----------
 */
export const SECTION_LABEL_PATTERN = /^\s*#[-=*~#\s]*([A-Z][A-Z ]*[A-Z])[-=*~#\s]*$/;

export const NAME_PLACEHOLDER = "{name}";

export const DEFAULT_LABEL_TEMPLATE = "# ---------- {name} ----------";

export const DEFAULT_REQUIRED_SECTIONS: readonly string[] = [
  "LIFECYCLE CALLBACKS",
  "EVENT HANDLERS",
  "RENDERING",
];

// ─── Section ↔ category table ────────────────────────────────────────────────

/** Categories a section label covers; empty for sections with no category. */
export function categoriesForSection(section: string): FunctionCategory[] {
  const canonical = section.trim().toUpperCase();
  return CATEGORY_RULES.filter((r) => r.section === canonical).map((r) => r.category);
}

export function sectionForCategory(category: FunctionCategory): string | undefined {
  return CATEGORY_RULES.find((r) => r.category === category)?.section;
}

export function categoryForName(name: string): FunctionCategory {
  for (const rule of CATEGORY_RULES) {
    if (rule.names.includes(name)) return rule.category;
  }
  return "other";
}

// ─── Module heuristics ───────────────────────────────────────────────────────

export const LIVE_MODULE_PATTERNS: readonly RegExp[] = [
  /use\s+Phoenix\.LiveView/,
  /use\s+[\w.]+\.LiveView\b/,
  /use\s+[\w.]+\.LiveComponent\b/,
  /use\s+[\w.]+,\s*:live_view\b/,
  /use\s+[\w.]+,\s*:live_component\b/,
  /def\s+mount\(/,
  /def\s+render\(/,
  /def\s+handle_event\(/,
];

export const COMPONENT_PATTERNS: readonly RegExp[] = [
  /use\s+Phoenix\.LiveComponent/,
  /use\s+[\w.]+\.LiveComponent\b/,
  /use\s+[\w.]+,\s*:live_component\b/,
  /defmodule\s+[\w.]*Component\b/,
  /@impl\s+true\s+def\s+update\(/,
];

export const EXTERNAL_TEMPLATE_PATTERNS: readonly RegExp[] = [
  /Phoenix\.View\.render/,
  /Phoenix\.Template\.render/,
  /render_template\(/,
  /render\s*\([^,\n]*,\s*["'][^"'\n]+\.html["']/, // render(assigns, "template.html")
  /render\s*\([^,\n]*,\s*:[a-z_]+\)/, // render(assigns, :template)
];

/** `lib/my_app_web.ex` and friends: the web entry module, never audited. */
export const WEB_ENTRY_FILE = /(^|\/)[a-z_]+_web\.ex$/;
