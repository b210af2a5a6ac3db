#!/usr/bin/env node
// CLI entry point for live-audit

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { ENGINE_VERSION } from "../types.js";
import type { ResolvedConfig, Warning } from "../types.js";
import { loadConfig, parseCliArgs } from "../config.js";
import type { ParsedArgs } from "../config.js";
import { runAudit, vlog } from "../runner.js";
import type { AuditRun } from "../runner.js";
import { enabledRules, parseOnlyFilter } from "../rules.js";
import { hasErrors } from "../violation.js";
import { renderConsoleReport } from "../reporters/console.js";
import { renderJsonReport } from "../reporters/json.js";
import { fixAndReaudit, formatFixOutcome } from "../autofix.js";

const HELP_TEXT = `
live-audit v${ENGINE_VERSION}

Usage:
  live-audit [files...]            Audit files (default: scan_paths from config)
  live-audit init                  Write a sample .code_audit.yml

Options:
  --strict             Exit non-zero when any error-level violation is found
  --only <rules>       Comma-separated rule names or prefixes (e.g. live_view,file_size)
  --format, -f         Report format: console (default) or json
  --output, -o         Write the report to a file instead of stdout
  --config, -c         Path to a config file (default: .code_audit.yml|.yaml|.json)
  --scan <paths>       Comma-separated globs or directories to scan
  --details            Include the rule behind each violation
  --fix                Insert missing LiveView section labels
  --preview            With --fix: print a diff preview instead of writing files
  --force              With --fix: recreate section labels even where present
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress information
  --help               Show this help text

Init options:
  --format yaml|json   Config file format (default: yaml)
  --output <path>      Config file path
  --overwrite          Replace an existing config file

Examples:
  live-audit --strict
  live-audit --only=live_view --fix --preview
  live-audit lib/my_app_web/live/page_live.ex --fix
`.trim();

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(0);
  }

  if (args.paths[0] === "init") {
    const { runInit } = await import("./init.js");
    const ok = runInit({ format: args.initFormat, output: args.output, overwrite: args.overwrite });
    process.exit(ok ? 0 : 1);
  }

  const warnings: Warning[] = [];
  const config = loadConfig({ configPath: args.config, strict: args.strict, scanPaths: args.scan }, warnings);
  const only = parseOnlyFilter(args.only);

  let run = runAudit(config, { files: args.paths, only, verbose: args.verbose }, warnings);

  if (args.fix) {
    run = runFixStep(args, config, run, only, warnings);
  }

  printWarnings(warnings, args.quiet);

  const report = args.format === "json"
    ? renderJsonReport(run.violations)
    : renderConsoleReport(run.violations, { verbose: args.verbose, details: args.details });

  if (args.output) {
    const outputPath = resolve(args.output);
    writeFileSafe(outputPath, report);
    if (!args.quiet) process.stderr.write(`Violations written to ${outputPath}\n`);
  } else {
    process.stdout.write(report);
  }

  process.exit(config.options.strict && hasErrors(run.violations) ? 1 : 0);
}

function runFixStep(
  args: ParsedArgs,
  config: ResolvedConfig,
  run: AuditRun,
  only: string[],
  warnings: Warning[],
): AuditRun {
  const sectionsEnabled = enabledRules(config, only).some((r) => r.name === "live_view_sections");
  if (!sectionsEnabled) {
    warnings.push({ level: "info", module: "autofix", message: "live_view_sections is disabled; nothing to fix" });
    return run;
  }

  vlog(args.verbose, `${args.preview ? "Previewing" : "Applying"} section fixes${args.force ? " (force)" : ""}...`);
  const fixed = fixAndReaudit(
    config,
    run,
    { preview: args.preview, force: args.force, only, verbose: args.verbose },
    warnings,
  );

  if (fixed.outcomes.length === 0) {
    process.stderr.write("No fixable violations found.\n");
  }
  for (const outcome of fixed.outcomes) {
    process.stderr.write(formatFixOutcome(outcome) + "\n");
  }
  return fixed.run;
}

// The re-audit after --fix can repeat a first-pass warning; print each once.
function printWarnings(warnings: readonly Warning[], quiet: boolean): void {
  if (quiet) return;
  const seen = new Set<string>();
  for (const w of warnings) {
    const where = w.file ? ` (${w.file})` : "";
    const line = `[${w.level}] ${w.module}: ${w.message}${where}`;
    if (seen.has(line)) continue;
    seen.add(line);
    process.stderr.write(line + "\n");
  }
}

function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Fatal error: ${msg}\n`);
  process.exit(1);
});
