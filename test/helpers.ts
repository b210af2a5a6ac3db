import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

export const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), "fixtures");

export function readFixture(name: string): string {
  return readFileSync(join(FIXTURES, "live", name), "utf-8");
}

export function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

const createdDirs: string[] = [];

/** Write `files` (relative path → content) into a fresh temp directory. */
export function setupProject(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), "live-audit-"));
  createdDirs.push(dir);
  for (const [path, content] of Object.entries(files)) {
    const fullPath = join(dir, path);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
  return dir;
}

export function cleanupProjects(): void {
  for (const dir of createdDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
}
