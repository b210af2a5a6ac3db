// src/file-discovery.ts — Scan-path discovery
// Walks the project root and keeps files matching scan_paths and not matching
// excluded_paths (both picomatch globs relative to the root).

import { readdirSync } from "node:fs";
import { join, relative, resolve, sep } from "node:path";
import picomatch from "picomatch";
import { DEFAULT_EXCLUDE_DIRS, SOURCE_EXTENSIONS } from "./types.js";
import type { Warning } from "./types.js";

const GLOB_CHARS = /[*?{}[\]!]/;
const SKIPPED_DIRS: ReadonlySet<string> = new Set(DEFAULT_EXCLUDE_DIRS);

/** A bare directory in --scan (e.g. `lib`) means every source file under it. */
export function normalizeScanPattern(pattern: string): string {
  const trimmed = pattern.trim().replace(/\/+$/, "");
  if (GLOB_CHARS.test(trimmed)) return trimmed;
  if (SOURCE_EXTENSIONS.test(trimmed)) return trimmed;
  return `${trimmed}/**/*.{ex,exs}`;
}

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

/**
 * Discover files under `rootDir` matching `scanPaths` and not `excludedPaths`.
 * Returns sorted absolute paths.
 */
export function discoverFiles(
  rootDir: string,
  scanPaths: readonly string[],
  excludedPaths: readonly string[],
  warnings: Warning[] = [],
): string[] {
  const absRoot = resolve(rootDir);
  const isIncluded = picomatch(scanPaths.map(normalizeScanPattern), { dot: true });
  const isExcluded = excludedPaths.length > 0 ? picomatch([...excludedPaths], { dot: true }) : () => false;

  const files: string[] = [];
  walkDirectory(absRoot, files, warnings);

  return files
    .filter((f) => {
      const rel = toPosix(relative(absRoot, f));
      return isIncluded(rel) && !isExcluded(rel);
    })
    .sort();
}

function walkDirectory(dir: string, results: string[], warnings: Warning[]): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (SKIPPED_DIRS.has(entry.name)) continue;
      walkDirectory(fullPath, results, warnings);
    } else if (entry.isFile() && SOURCE_EXTENSIONS.test(entry.name)) {
      results.push(fullPath);
    }
  }
}
