// src/config.ts — Config Resolver
// Layers: defaults ← global file (~) ← project file (or --config) ← CLI options.
// Parse failures and invalid values become warnings; they never abort a run.

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { extname, join, resolve } from "node:path";
import YAML from "yaml";
import type {
  FileSizeConfig,
  LiveViewSectionsConfig,
  ReportFormat,
  ResolvedConfig,
  ViolationLevel,
  Warning,
} from "./types.js";
import { DEFAULT_LABEL_TEMPLATE, DEFAULT_REQUIRED_SECTIONS } from "./sections/patterns.js";

export const CONFIG_FILENAMES = [".code_audit.yml", ".code_audit.yaml", ".code_audit.json"] as const;

export const DEFAULT_EXCLUDED_PATHS = [
  "deps/**",
  "_build/**",
  "priv/static/**",
  ".git/**",
  ".*/**",
  "test/**",
  "docs/**",
  "rel/**",
  "assets/node_modules/**",
];

export const DEFAULT_SCAN_PATHS = ["lib/**/*.{ex,exs}"];

export function defaultConfig(rootDir: string = process.cwd()): ResolvedConfig {
  return {
    rootDir,
    rules: {
      live_view_sections: {
        enabled: true,
        violation_level: "warning",
        required: [...DEFAULT_REQUIRED_SECTIONS],
        check_external_templates: true,
        check_component_structure: true,
        label_template: DEFAULT_LABEL_TEMPLATE,
      },
      file_size: {
        enabled: true,
        violation_level: "warning",
        max_lines: 1000,
        warning_at: 920,
      },
    },
    scan_paths: [...DEFAULT_SCAN_PATHS],
    excluded_paths: [...DEFAULT_EXCLUDED_PATHS],
    options: { strict: false },
  };
}

export interface LoadConfigOptions {
  rootDir?: string;
  configPath?: string;
  homeDir?: string;
  strict?: boolean;
  scanPaths?: string[];
}

/**
 * Resolve config from defaults, config files and CLI options.
 */
export function loadConfig(
  options: LoadConfigOptions = {},
  warnings: Warning[] = [],
): ResolvedConfig {
  const rootDir = resolve(options.rootDir ?? process.cwd());
  let config = defaultConfig(rootDir);

  const globalFile = findConfigFile(options.homeDir ?? homedir());
  if (globalFile) {
    config = applyLayer(config, readConfigFile(globalFile, warnings), globalFile, warnings);
  }

  const projectFile = options.configPath ? resolve(rootDir, options.configPath) : findConfigFile(rootDir);
  if (options.configPath && projectFile && !existsSync(projectFile)) {
    warnings.push({ level: "warn", module: "config", message: `Config file not found: ${options.configPath}` });
  } else if (projectFile) {
    config = applyLayer(config, readConfigFile(projectFile, warnings), projectFile, warnings);
  }

  if (options.strict !== undefined) {
    config = { ...config, options: { ...config.options, strict: options.strict } };
  }
  if (options.scanPaths && options.scanPaths.length > 0) {
    config = { ...config, scan_paths: [...options.scanPaths] };
  }

  return config;
}

export function findConfigFile(dir: string): string | undefined {
  for (const name of CONFIG_FILENAMES) {
    const candidate = join(dir, name);
    if (existsSync(candidate)) return candidate;
  }
  return undefined;
}

function readConfigFile(filePath: string, warnings: Warning[]): unknown {
  try {
    const content = readFileSync(filePath, "utf-8");
    return extname(filePath) === ".json" ? JSON.parse(content) : YAML.parse(content);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

// ─── Layer merging ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isViolationLevel(value: unknown): value is ViolationLevel {
  return value === "warning" || value === "error";
}

class LayerReader {
  constructor(
    private readonly source: string,
    private readonly warnings: Warning[],
    private readonly prefix = "",
  ) {}

  child(key: string): LayerReader {
    return new LayerReader(this.source, this.warnings, this.path(key));
  }

  private path(key: string): string {
    return this.prefix ? `${this.prefix}.${key}` : key;
  }

  private invalid(key: string, expected: string): void {
    this.warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring ${this.path(key)}: expected ${expected}`,
      file: this.source,
    });
  }

  boolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
    if (!(key in raw)) return fallback;
    const value = raw[key];
    if (typeof value === "boolean") return value;
    this.invalid(key, "a boolean");
    return fallback;
  }

  count(raw: Record<string, unknown>, key: string, fallback: number): number {
    if (!(key in raw)) return fallback;
    const value = raw[key];
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
    this.invalid(key, "a non-negative integer");
    return fallback;
  }

  string(raw: Record<string, unknown>, key: string, fallback: string): string {
    if (!(key in raw)) return fallback;
    const value = raw[key];
    if (typeof value === "string") return value;
    this.invalid(key, "a string");
    return fallback;
  }

  strings(raw: Record<string, unknown>, key: string, fallback: string[]): string[] {
    if (!(key in raw)) return fallback;
    const value = raw[key];
    if (isStringArray(value)) return [...value];
    this.invalid(key, "a list of strings");
    return fallback;
  }

  level(raw: Record<string, unknown>, key: string, fallback: ViolationLevel): ViolationLevel {
    if (!(key in raw)) return fallback;
    const value = raw[key];
    if (isViolationLevel(value)) return value;
    this.invalid(key, `"warning" or "error"`);
    return fallback;
  }

  record(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    if (!(key in raw)) return {};
    const value = raw[key];
    if (isRecord(value)) return value;
    this.invalid(key, "a mapping");
    return {};
  }
}

/**
 * Merge one parsed config file over `base`. Known keys are validated; unknown
 * keys are ignored. Lists replace rather than concatenate.
 */
export function applyLayer(
  base: ResolvedConfig,
  raw: unknown,
  source: string,
  warnings: Warning[],
): ResolvedConfig {
  if (raw === null || raw === undefined) return base;
  if (!isRecord(raw)) {
    warnings.push({ level: "warn", module: "config", message: "Config file must contain a mapping", file: source });
    return base;
  }

  const root = new LayerReader(source, warnings);
  const rulesReader = root.child("rules");
  const rules = root.record(raw, "rules");
  const lvReader = rulesReader.child("live_view_sections");
  const lv = rulesReader.record(rules, "live_view_sections");
  const fsReader = rulesReader.child("file_size");
  const fs = rulesReader.record(rules, "file_size");
  const opts = root.record(raw, "options");

  const baseLv = base.rules.live_view_sections;
  const liveView: LiveViewSectionsConfig = {
    enabled: lvReader.boolean(lv, "enabled", baseLv.enabled),
    violation_level: lvReader.level(lv, "violation_level", baseLv.violation_level),
    required: lvReader.strings(lv, "required", baseLv.required),
    check_external_templates: lvReader.boolean(lv, "check_external_templates", baseLv.check_external_templates),
    check_component_structure: lvReader.boolean(lv, "check_component_structure", baseLv.check_component_structure),
    label_template: lvReader.string(lv, "label_template", baseLv.label_template),
  };

  const baseFs = base.rules.file_size;
  const fileSize: FileSizeConfig = {
    enabled: fsReader.boolean(fs, "enabled", baseFs.enabled),
    violation_level: fsReader.level(fs, "violation_level", baseFs.violation_level),
    max_lines: fsReader.count(fs, "max_lines", baseFs.max_lines),
    warning_at: fsReader.count(fs, "warning_at", baseFs.warning_at),
  };

  return {
    rootDir: base.rootDir,
    rules: { live_view_sections: liveView, file_size: fileSize },
    scan_paths: root.strings(raw, "scan_paths", base.scan_paths),
    excluded_paths: root.strings(raw, "excluded_paths", base.excluded_paths),
    options: { strict: root.child("options").boolean(opts, "strict", base.options.strict) },
  };
}

// ─── CLI args ────────────────────────────────────────────────────────────────

export interface ParsedArgs {
  paths: string[];
  strict?: boolean;
  only?: string;
  format: ReportFormat;
  output?: string;
  config?: string;
  scan?: string[];
  verbose: boolean;
  quiet: boolean;
  details: boolean;
  fix: boolean;
  preview: boolean;
  force: boolean;
  help: boolean;
  overwrite: boolean;
  initFormat?: string;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Parse CLI args using mri. Throws on an unsupported --format.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { f: "format", o: "output", c: "config", q: "quiet", v: "verbose" },
    boolean: ["strict", "verbose", "quiet", "details", "fix", "preview", "force", "help", "overwrite"],
    string: ["only", "format", "output", "config", "scan"],
  });

  const paths = args._.map(String);
  const isInit = paths[0] === "init";
  const format = optionalString(args.format);

  if (!isInit && format !== undefined && format !== "console" && format !== "json") {
    throw new Error(`Unsupported format: ${format}`);
  }

  const scan = optionalString(args.scan);

  return {
    paths,
    strict: args.strict === true ? true : undefined,
    only: optionalString(args.only),
    format: format === "json" && !isInit ? "json" : "console",
    output: optionalString(args.output),
    config: optionalString(args.config),
    scan: scan
      ?.split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
    verbose: args.verbose === true,
    quiet: args.quiet === true,
    details: args.details === true,
    fix: args.fix === true,
    preview: args.preview === true,
    force: args.force === true,
    help: args.help === true,
    overwrite: args.overwrite === true,
    initFormat: isInit ? format : undefined,
  };
}
