import { describe, it, expect } from "vitest";
import { checkFileSize, countLines } from "../src/analyzers/file-size.js";
import type { FileSizeConfig } from "../src/types.js";

const config: FileSizeConfig = { enabled: true, violation_level: "error", max_lines: 10, warning_at: 5 };

function linesOf(count: number): string {
  return Array.from({ length: count }, (_, i) => `# line ${i + 1}`).join("\n");
}

describe("countLines", () => {
  it("counts newline-separated lines", () => {
    expect(countLines("a")).toBe(1);
    expect(countLines("a\nb\n")).toBe(3);
  });
});

describe("checkFileSize", () => {
  it("reports files over the limit at the configured level", () => {
    expect(checkFileSize("lib/big.ex", linesOf(11), config)).toEqual([
      {
        message: "File exceeds maximum size limit\n   Current size: 11 lines\n   Recommended max: 10 lines",
        file: "lib/big.ex",
        level: "error",
        rule: "file_size",
      },
    ]);
  });

  it("warns when a file passes the warning threshold", () => {
    const [violation] = checkFileSize("lib/medium.exs", linesOf(7), config);
    expect(violation.level).toBe("warning");
    expect(violation.message).toBe(
      "File approaches maximum size limit\n   Current size: 7 lines\n   Recommended max: 10 lines",
    );
  });

  it("accepts files at or under the warning threshold", () => {
    expect(checkFileSize("lib/small.ex", linesOf(5), config)).toEqual([]);
  });

  it("accepts a file exactly at the limit with a warning only", () => {
    const [violation] = checkFileSize("lib/edge.ex", linesOf(10), config);
    expect(violation.message.startsWith("File approaches maximum size limit")).toBe(true);
  });

  it("ignores non-source files", () => {
    expect(checkFileSize("README.md", linesOf(50), config)).toEqual([]);
  });
});
