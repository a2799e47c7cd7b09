/**
 * Variadic Reduction Tests
 *
 * Verifies:
 * - sumOf / maxOf stay in bigint for bigint-only lists and promote mixes to number
 * - meanOf / varianceOf always work in double (no truncation)
 * - Characters, text and empty argument lists are refused before any arithmetic
 */

import { describe, it, expect } from "vitest";
import {
  attempt,
  EmptyInputError,
  maxOf,
  meanOf,
  reduceArguments,
  sumOf,
  TypeIneligibleError,
  varianceOf,
} from "../src/numeric/index.js";

describe("sumOf", () => {
  it("adds numbers", () => {
    expect(sumOf(1, 2, 33, 4)).toBe(40);
    expect(sumOf(0.5, 1, 2.5)).toBe(4);
    expect(sumOf(7)).toBe(7);
  });

  it("stays in bigint when every argument is a bigint", () => {
    expect(sumOf(1n, 2n, 3n)).toBe(6n);
  });

  it("promotes a mix of bigint and number to number", () => {
    expect(sumOf(1n, 0.5)).toBe(1.5);
  });
});

describe("meanOf", () => {
  it("averages in double", () => {
    expect(meanOf(1, 2, 3, 4)).toBe(2.5);
    expect(meanOf(0.1, 2, 3, 4)).toBeCloseTo(2.275, 12);
  });

  it("does not truncate integral arguments", () => {
    expect(meanOf(1n, 2n)).toBe(1.5);
    expect(meanOf(1, 2)).toBe(1.5);
  });
});

describe("varianceOf", () => {
  it("computes population variance", () => {
    expect(varianceOf(1, 2, 3, 4)).toBe(1.25);
    expect(varianceOf(0.1, 2, 3, 4)).toBeCloseTo(2.076875, 12);
    expect(varianceOf(1n, 3n)).toBe(1);
  });

  it("is zero for a single argument or equal arguments", () => {
    expect(varianceOf(9)).toBe(0);
    expect(varianceOf(4, 4, 4)).toBe(0);
  });
});

describe("maxOf", () => {
  it("returns the greatest argument", () => {
    expect(maxOf(1, 2, 33, 4)).toBe(33);
    expect(maxOf(1, 2.7, 3, 4)).toBe(4);
    expect(maxOf(-3, -8)).toBe(-3);
  });

  it("stays in bigint when every argument is a bigint", () => {
    expect(maxOf(5n, 9n, 2n)).toBe(9n);
  });

  it("promotes the winner of a mixed list to number", () => {
    expect(maxOf(1n, 2.5)).toBe(2.5);
    expect(maxOf(3n, 2.5)).toBe(3);
  });
});

describe("reduceArguments", () => {
  it("applies the named reduction to a list of unknown values", () => {
    const parsed: unknown[] = [1n, 9n, 4n];
    expect(reduceArguments("maxOf", parsed)).toBe(9n);
    expect(reduceArguments("sumOf", parsed)).toBe(14n);
    expect(reduceArguments("meanOf", [1, 2])).toBe(1.5);
    expect(reduceArguments("varianceOf", [1, 2, 3, 4])).toBe(1.25);
  });
});

describe("argument checks", () => {
  it("refuses characters with the argument position named", () => {
    const result = attempt(() => reduceArguments("sumOf", ["a", "b"]));
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(TypeIneligibleError);
    expect(result.error.message).toBe(
      "sumOf: argument 0 (character 'a') is not numeric; comparable requires a numeric, non-character argument type",
    );
  });

  it("reports the first ineligible argument", () => {
    let caught: unknown;
    try {
      reduceArguments("maxOf", [1, 2, "three"]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TypeIneligibleError);
    if (!(caught instanceof TypeIneligibleError)) return;
    expect(caught.index).toBe(2);
    expect(caught.capability).toBe("comparable");
    expect(caught.message).toBe(
      'maxOf: argument 2 (text "three") is not numeric; comparable requires a numeric, non-character argument type',
    );
  });

  it("refuses booleans", () => {
    expect(() => reduceArguments("varianceOf", [1, true])).toThrow(
      "varianceOf: argument 1 (boolean) is not numeric",
    );
  });

  it("refuses an empty argument list", () => {
    expect(() => reduceArguments("meanOf", [])).toThrow(EmptyInputError);
    expect(() => reduceArguments("sumOf", [])).toThrow("sumOf: input is empty");
  });

  it("applies the same checks to the typed forms", () => {
    expect(() => Reflect.apply(sumOf, undefined, ["a", "b"])).toThrow(TypeIneligibleError);
    expect(() => Reflect.apply(maxOf, undefined, [])).toThrow("maxOf: input is empty");
  });
});

// ── purity ───────────────────────────────────────────────────────────

describe("repeat calls", () => {
  it("give identical results", () => {
    const args: [number, number, number] = [2.5, 7.25, 1.125];
    expect(sumOf(...args)).toBe(sumOf(...args));
    expect(meanOf(...args)).toBe(meanOf(...args));
    expect(varianceOf(...args)).toBe(varianceOf(...args));
    expect(maxOf(...args)).toBe(maxOf(...args));
    expect(sumOf(4n, 5n)).toBe(sumOf(4n, 5n));
    expect(maxOf(4n, 5n)).toBe(maxOf(4n, 5n));
    expect(args).toEqual([2.5, 7.25, 1.125]);
  });
});
