/**
 * Demo Driver Tests
 *
 * Verifies the values the demo reports for every reduction, the
 * diagnostics for refused inputs, and both output formats.
 */

import { describe, it, expect } from "vitest";
import { formatValue, renderDemo, runDemo } from "../src/cli/demo.js";
import type { DemoSection } from "../src/cli/demo.js";

function valuesOf(sections: DemoSection[], title: string): unknown[] {
  const section = sections.find((s) => s.title === title);
  if (!section) throw new Error(`missing section ${title}`);
  return section.cases.map((entry) => (entry.result.success ? entry.result.value : entry.result.error.code));
}

describe("runDemo", () => {
  const sections = runDemo();

  it("reports every section in order", () => {
    expect(sections.map((s) => s.title)).toEqual([
      "sum",
      "mean",
      "variance",
      "max",
      "transformReduce",
      "sumOf",
      "meanOf",
      "varianceOf",
      "maxOf",
      "rejected",
    ]);
  });

  it("computes the collection reductions", () => {
    expect(valuesOf(sections, "sum")).toEqual([10, 4]);
    expect(valuesOf(sections, "mean")).toEqual([2, 2.5]);
    expect(valuesOf(sections, "variance")).toEqual([1.25, 1.25]);
    expect(valuesOf(sections, "max")).toEqual([9, 4.8]);
    expect(valuesOf(sections, "transformReduce")).toEqual([14, 36]);
  });

  it("computes the variadic reductions", () => {
    expect(valuesOf(sections, "sumOf")).toEqual([40, 4]);
    expect(valuesOf(sections, "maxOf")).toEqual([4, 33]);

    const [meanMixed, meanInts] = valuesOf(sections, "meanOf");
    expect(meanMixed).toBeCloseTo(2.275, 12);
    expect(meanInts).toBe(2.5);

    const [varianceInts, varianceMixed] = valuesOf(sections, "varianceOf");
    expect(varianceInts).toBe(1.25);
    expect(varianceMixed).toBeCloseTo(2.076875, 12);
  });

  it("refuses every ineligible input with the matching error kind", () => {
    expect(valuesOf(sections, "rejected")).toEqual([
      "TYPE_INELIGIBLE",
      "TYPE_INELIGIBLE",
      "TYPE_INELIGIBLE",
      "EMPTY_INPUT",
      "TYPE_INELIGIBLE",
      "TYPE_INELIGIBLE",
      "TYPE_INELIGIBLE",
    ]);
  });
});

describe("renderDemo", () => {
  it("renders text sections separated by dashed lines", () => {
    const output = renderDemo(runDemo(), "text");
    const lines = output.split("\n");
    expect(lines.slice(0, 5)).toEqual([
      "Testing sum:",
      "  [1, 2, 3, 4] = 10",
      "  [1.5, 2.0, 0.5] = 4",
      "-".repeat(44),
      "Testing mean:",
    ]);
    expect(lines).toContain("  mean [] -> EMPTY_INPUT: mean: input is empty");
  });

  it("renders JSON with values as strings and errors as codes", () => {
    const payload = JSON.parse(renderDemo(runDemo(), "json"));
    expect(payload[0]).toEqual({
      title: "sum",
      cases: [
        { label: "[1, 2, 3, 4]", value: "10" },
        { label: "[1.5, 2.0, 0.5]", value: "4" },
      ],
    });
    expect(payload[9].cases[3]).toEqual({
      label: "mean []",
      error: "EMPTY_INPUT",
      message: "mean: input is empty",
    });
  });
});

describe("formatValue", () => {
  it("marks bigints with n", () => {
    expect(formatValue(6n)).toBe("6n");
    expect(formatValue(2.5)).toBe("2.5");
  });
});
