// src/types.ts — Shared types for live-audit

// ─── Diagnostics ─────────────────────────────────────────────────────────────

export type ViolationLevel = "warning" | "error";

export type RuleName = "live_view_sections" | "file_size";

export interface Violation {
  readonly message: string;
  readonly file: string;
  readonly line?: number; // 1-based
  readonly level: ViolationLevel;
  readonly rule: RuleName;
}

export interface ViolationSummary {
  errors: number;
  warnings: number;
  total: number;
}

// Tool-level diagnostics (config problems, unreadable files). Not violations.
export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Section classification ──────────────────────────────────────────────────

export type FunctionCategory =
  | "lifecycle"
  | "event"
  | "info"
  | "rendering"
  | "other";

export type LineClass =
  | { kind: "label"; name: string }
  | { kind: "declaration"; name: string; category: FunctionCategory }
  | { kind: "code" };

export interface Declaration {
  lineIndex: number; // 0-based
  name: string;
  category: FunctionCategory;
}

export interface SectionOccurrence {
  lineIndex: number; // 0-based
  rawLabelText: string;
  canonicalName: string;
}

export interface Classification {
  declarations: Declaration[];
  occurrences: SectionOccurrence[];
  categories: ReadonlySet<FunctionCategory>;
}

// ─── Planning & patching ─────────────────────────────────────────────────────

export interface InsertionPlan {
  lineIndex: number; // 0-based, index of the declaration the label precedes
  sectionName: string;
  indentation: string;
  renderedLabelLine: string;
}

export interface LabelRemoval {
  lineIndex: number; // 0-based, in the original text
  sectionName: string;
  rawLabelText: string;
}

export interface FixOptions {
  force?: boolean;
  preview?: boolean;
  filePath?: string;
  labelTemplate?: string;
}

export type FixResult =
  | { ok: true; kind: "fixed"; content: string; inserted: string[]; removed: number }
  | { ok: true; kind: "preview"; preview: string; changed: boolean }
  | { ok: false; kind: "nothing-to-fix"; message: string }
  | { ok: false; kind: "invalid-template"; message: string };

// ─── Configuration ───────────────────────────────────────────────────────────

// Rule config keys mirror the on-disk .code_audit.yml format.
export interface LiveViewSectionsConfig {
  enabled: boolean;
  violation_level: ViolationLevel;
  required: string[];
  check_external_templates: boolean;
  check_component_structure: boolean;
  label_template: string;
}

export interface FileSizeConfig {
  enabled: boolean;
  violation_level: ViolationLevel;
  max_lines: number;
  warning_at: number;
}

export interface RulesConfig {
  live_view_sections: LiveViewSectionsConfig;
  file_size: FileSizeConfig;
}

export interface ResolvedConfig {
  rootDir: string;
  rules: RulesConfig;
  scan_paths: string[];
  excluded_paths: string[];
  options: {
    strict: boolean;
  };
}

export type ReportFormat = "console" | "json";

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.1.0";

export const SOURCE_EXTENSIONS = /\.(ex|exs)$/;

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  "deps",
  "_build",
  ".git",
  ".elixir_ls",
] as const;
