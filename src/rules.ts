// src/rules.ts — Rule registry
// Every rule exposes the same check(filePath, content, config) contract; the
// registry binds each one to its slice of the resolved config.

import type { ResolvedConfig, RuleName, RulesConfig, Violation } from "./types.js";
import { checkLiveView } from "./analyzers/live-view.js";
import { checkFileSize } from "./analyzers/file-size.js";

export interface Rule {
  name: RuleName;
  description: string;
  check(filePath: string, content: string, rules: RulesConfig): Violation[];
}

export const ALL_RULES: readonly Rule[] = [
  {
    name: "file_size",
    description: "Checks file sizes against configured limits",
    check: (filePath, content, rules) => checkFileSize(filePath, content, rules.file_size),
  },
  {
    name: "live_view_sections",
    description:
      "Checks that LiveView modules have proper section labels and follow component structure conventions",
    check: (filePath, content, rules) => checkLiveView(filePath, content, rules.live_view_sections),
  },
];

export function findRule(name: string): Rule | undefined {
  return ALL_RULES.find((r) => r.name === name);
}

/**
 * Rules enabled in config, narrowed by `--only` filters. A filter selects a
 * rule when it equals the rule name or is a prefix of it (`live_view`).
 */
export function enabledRules(config: ResolvedConfig, only: readonly string[] = []): Rule[] {
  return ALL_RULES.filter((rule) => {
    if (!config.rules[rule.name].enabled) return false;
    if (only.length === 0) return true;
    return only.some((f) => rule.name === f || rule.name.startsWith(f));
  });
}

export function parseOnlyFilter(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
