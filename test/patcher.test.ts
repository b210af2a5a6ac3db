import { describe, it, expect } from "vitest";
import type { InsertionPlan, LabelRemoval } from "../src/types.js";
import {
  PlanInvariantError,
  applyInsertionsDescending,
  applyRemovalsAfterInsertions,
  postEditLineNumber,
  renderPreview,
} from "../src/sections/patcher.js";

function plan(lineIndex: number, sectionName: string, renderedLabelLine = sectionName): InsertionPlan {
  return { lineIndex, sectionName, indentation: "", renderedLabelLine };
}

const letters = ["a", "b", "c", "d", "e", "f", "g", "h"];

describe("applyInsertionsDescending", () => {
  it("inserts each label before its original target line", () => {
    const result = applyInsertionsDescending(letters, [plan(1, "X"), plan(4, "Y"), plan(6, "Z")]);
    expect(result).toEqual(["a", "X", "b", "c", "d", "Y", "e", "f", "Z", "g", "h"]);
  });

  it("gives the same result regardless of plan order", () => {
    const result = applyInsertionsDescending(letters, [plan(6, "Z"), plan(1, "X"), plan(4, "Y")]);
    expect(result).toEqual(["a", "X", "b", "c", "d", "Y", "e", "f", "Z", "g", "h"]);
  });

  it("keeps plan order for equal indices", () => {
    const result = applyInsertionsDescending(["a", "b"], [plan(1, "first"), plan(1, "second")]);
    expect(result).toEqual(["a", "first", "second", "b"]);
  });

  it("can insert before the first line", () => {
    expect(applyInsertionsDescending(["a"], [plan(0, "top")])).toEqual(["top", "a"]);
  });

  it("does not mutate the input", () => {
    const input = ["a", "b"];
    applyInsertionsDescending(input, [plan(1, "X")]);
    expect(input).toEqual(["a", "b"]);
  });

  it("returns a copy for an empty plan", () => {
    expect(applyInsertionsDescending(letters, [])).toEqual(letters);
  });

  it("throws on an out-of-range plan", () => {
    expect(() => applyInsertionsDescending(["a", "b"], [plan(2, "X")])).toThrow(PlanInvariantError);
    expect(() => applyInsertionsDescending(["a", "b"], [plan(-1, "X")])).toThrow(
      "Insertion for X line index -1 is outside the text bounds [0, 2)",
    );
  });
});

describe("applyRemovalsAfterInsertions", () => {
  it("removes original lines after accounting for inserted ones", () => {
    const original = ["a", "OLD", "b", "c"];
    const plans = [plan(2, "S", "NEW")];
    const removals: LabelRemoval[] = [{ lineIndex: 1, sectionName: "S", rawLabelText: "OLD" }];

    const inserted = applyInsertionsDescending(original, plans);
    expect(inserted).toEqual(["a", "OLD", "NEW", "b", "c"]);
    expect(applyRemovalsAfterInsertions(inserted, original.length, plans, removals)).toEqual([
      "a",
      "NEW",
      "b",
      "c",
    ]);
  });

  it("shifts removals that sit after an insertion", () => {
    const original = ["a", "b", "OLD", "c"];
    const plans = [plan(1, "S", "NEW")];
    const removals: LabelRemoval[] = [{ lineIndex: 2, sectionName: "S", rawLabelText: "OLD" }];

    const inserted = applyInsertionsDescending(original, plans);
    expect(applyRemovalsAfterInsertions(inserted, original.length, plans, removals)).toEqual([
      "a",
      "NEW",
      "b",
      "c",
    ]);
  });

  it("throws when a removal is outside the original text", () => {
    const removals: LabelRemoval[] = [{ lineIndex: 5, sectionName: "S", rawLabelText: "x" }];
    expect(() => applyRemovalsAfterInsertions(["a"], 1, [], removals)).toThrow(PlanInvariantError);
  });
});

describe("postEditLineNumber", () => {
  it("adds earlier insertions and subtracts earlier removals", () => {
    const plans = [plan(3, "A"), plan(8, "B")];
    expect(postEditLineNumber(plans, [], 0)).toBe(4);
    expect(postEditLineNumber(plans, [], 1)).toBe(10);

    const removals: LabelRemoval[] = [{ lineIndex: 2, sectionName: "A", rawLabelText: "# A" }];
    expect(postEditLineNumber(plans, removals, 0)).toBe(3);
    expect(postEditLineNumber(plans, removals, 1)).toBe(9);
  });
});

describe("renderPreview", () => {
  it("shows three lines of context around an insertion", () => {
    expect(renderPreview(letters, [plan(4, "S", "L")])).toBe(
      [
        "Preview changes:",
        "",
        "## Insert S at line 5:",
        "  2: b",
        "  3: c",
        "  4: d",
        "+ 5: L",
        "  5: e",
        "  6: f",
        "  7: g",
      ].join("\n"),
    );
  });

  it("clips context at the start and end of the file", () => {
    expect(renderPreview(["a", "b"], [plan(0, "S", "L")])).toBe(
      ["Preview changes:", "", "## Insert S at line 1:", "+ 1: L", "  1: a", "  2: b"].join("\n"),
    );
  });

  it("numbers later insertions after earlier ones", () => {
    const preview = renderPreview(letters, [plan(6, "B", "LB"), plan(1, "A", "LA")]);
    expect(preview).toBe(
      [
        "Preview changes:",
        "",
        "## Insert A at line 2:",
        "  1: a",
        "+ 2: LA",
        "  2: b",
        "  3: c",
        "  4: d",
        "",
        "## Insert B at line 8:",
        "  4: d",
        "  5: e",
        "  6: f",
        "+ 8: LB",
        "  7: g",
        "  8: h",
      ].join("\n"),
    );
  });

  it("adds a path:line locator when a file path is given", () => {
    const preview = renderPreview(["a", "b"], [plan(1, "S", "L")], { filePath: "lib/x_live.ex" });
    expect(preview.split("\n")).toEqual([
      "Preview changes:",
      "",
      "## Insert S at line 2:",
      "  1: a",
      "+ 2: L",
      "  lib/x_live.ex:2",
      "  2: b",
    ]);
  });

  it("shows removals before the insertion they precede", () => {
    const lines = [
      "defmodule A do",
      "  use Phoenix.LiveView",
      "  # LIFECYCLE CALLBACKS",
      "  def mount(_p, _s, socket), do: {:ok, socket}",
      "end",
    ];
    const removals: LabelRemoval[] = [
      { lineIndex: 2, sectionName: "LIFECYCLE CALLBACKS", rawLabelText: "  # LIFECYCLE CALLBACKS" },
    ];
    const plans = [plan(3, "LIFECYCLE CALLBACKS", "  # ---------- LIFECYCLE CALLBACKS ----------")];

    expect(renderPreview(lines, plans, { removals })).toBe(
      [
        "Preview changes:",
        "",
        "## Remove LIFECYCLE CALLBACKS at line 3:",
        "- 3:   # LIFECYCLE CALLBACKS",
        "",
        "## Insert LIFECYCLE CALLBACKS at line 3:",
        "  1: defmodule A do",
        "  2:   use Phoenix.LiveView",
        "  3:   # LIFECYCLE CALLBACKS",
        "+ 3:   # ---------- LIFECYCLE CALLBACKS ----------",
        "  4:   def mount(_p, _s, socket), do: {:ok, socket}",
        "  5: end",
      ].join("\n"),
    );
  });

  it("rejects a plan outside the text", () => {
    expect(() => renderPreview(["a"], [plan(3, "S")])).toThrow(PlanInvariantError);
  });
});
