// src/bin/init.ts — `live-audit init`
// Writes a sample configuration file holding the built-in defaults.

import { existsSync, writeFileSync } from "node:fs";
import { relative, resolve } from "node:path";
import YAML from "yaml";
import { defaultConfig } from "../config.js";

export type InitFormat = "yaml" | "json";

export interface InitOptions {
  format?: string;
  output?: string;
  overwrite?: boolean;
  cwd?: string;
}

function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

export function parseInitFormat(value: string | undefined): InitFormat | null {
  if (value === undefined || value === "yaml" || value === "yml") return "yaml";
  if (value === "json") return "json";
  return null;
}

export function defaultOutputPath(format: InitFormat): string {
  return format === "json" ? ".code_audit.json" : ".code_audit.yml";
}

/** Defaults as they appear on disk (no rootDir, which is always the cwd). */
export function renderSampleConfig(format: InitFormat): string {
  const { rootDir: _rootDir, ...sample } = defaultConfig();
  if (format === "json") return JSON.stringify(sample, null, 2) + "\n";
  return "# live-audit configuration\n" + YAML.stringify(sample);
}

/**
 * Write the sample config. Returns false (after printing why) when the format
 * is unknown or the file exists and overwrite was not requested.
 */
export function runInit(options: InitOptions = {}): boolean {
  const cwd = options.cwd ?? process.cwd();
  const format = parseInitFormat(options.format);
  if (!format) {
    stderr(`  Unsupported config format: ${options.format}. Use yaml or json.`);
    return false;
  }

  const outPath = resolve(cwd, options.output ?? defaultOutputPath(format));
  if (existsSync(outPath) && !options.overwrite) {
    stderr(`  ${relative(cwd, outPath)} already exists. Use --overwrite to replace it.`);
    return false;
  }

  writeFileSync(outPath, renderSampleConfig(format));
  stderr(`  Configuration file generated at: ${relative(cwd, outPath)}`);
  return true;
}
