// src/analyzers/file-size.ts — Line-count limits for source files

import type { FileSizeConfig, Violation } from "../types.js";
import { isSourceFile } from "../sections/classifier.js";
import { createViolation, withDetails } from "../violation.js";

export function countLines(content: string): number {
  return content.split("\n").length;
}

export function checkFileSize(
  filePath: string,
  content: string,
  config: FileSizeConfig,
): Violation[] {
  if (!isSourceFile(filePath)) return [];

  const lineCount = countLines(content);
  const details = [`Current size: ${lineCount} lines`, `Recommended max: ${config.max_lines} lines`];

  if (lineCount > config.max_lines) {
    return [
      createViolation(withDetails("File exceeds maximum size limit", ...details), filePath, {
        rule: "file_size",
        level: config.violation_level,
      }),
    ];
  }

  if (lineCount > config.warning_at) {
    return [
      createViolation(withDetails("File approaches maximum size limit", ...details), filePath, {
        rule: "file_size",
        level: "warning",
      }),
    ];
  }

  return [];
}
