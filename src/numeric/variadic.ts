/**
 * Variadic Reductions
 *
 * The same reductions over a non-empty argument list. Arguments are
 * numbers or bigints; a list of bigints only stays in bigint, any other
 * mix is promoted to number. mean and variance always work in double.
 *
 * `reduceArguments` applies one of them to values whose types are only
 * known at run time (parsed input, untyped callers).
 */

import type { NumericArgument } from "./guard.js";
import { checkArguments } from "./guard.js";

export type NonEmpty<T> = [T, ...T[]];

export type VariadicOperation = "sumOf" | "meanOf" | "varianceOf" | "maxOf";

function isBigIntList(args: NumericArgument[]): args is bigint[] {
  return args.every((value) => typeof value === "bigint");
}

function widen(args: NumericArgument[]): number[] {
  return args.map((value) => Number(value));
}

function widenedMean(values: number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
}

// ── Checked cores ──────────────────────────────────────────────────

function sumArguments(args: NumericArgument[]): number | bigint {
  if (isBigIntList(args)) {
    let total = 0n;
    for (const value of args) total += value;
    return total;
  }
  let total = 0;
  for (const value of widen(args)) total += value;
  return total;
}

function meanArguments(args: NumericArgument[]): number {
  return widenedMean(widen(args));
}

function varianceArguments(args: NumericArgument[]): number {
  const values = widen(args);
  const mu = widenedMean(values);
  let acc = 0;
  for (const value of values) {
    const d = value - mu;
    acc += d * d;
  }
  return acc / values.length;
}

function maxArguments(args: NumericArgument[]): number | bigint {
  let best = args[0];
  for (const value of args.slice(1)) {
    if (value > best) best = value;
  }
  if (isBigIntList(args)) return best;
  return Number(best);
}

const CORES: Record<VariadicOperation, (args: NumericArgument[]) => number | bigint> = {
  sumOf: sumArguments,
  meanOf: meanArguments,
  varianceOf: varianceArguments,
  maxOf: maxArguments,
};

// ── Public forms ───────────────────────────────────────────────────

export function sumOf(...xs: NonEmpty<bigint>): bigint;
export function sumOf(...xs: NonEmpty<number | bigint>): number;
export function sumOf(...xs: unknown[]): number | bigint {
  return sumArguments(checkArguments("sumOf", xs));
}

export function meanOf(...xs: NonEmpty<number | bigint>): number;
export function meanOf(...xs: unknown[]): number {
  return meanArguments(checkArguments("meanOf", xs));
}

/** Population variance of the arguments widened to double. */
export function varianceOf(...xs: NonEmpty<number | bigint>): number;
export function varianceOf(...xs: unknown[]): number {
  return varianceArguments(checkArguments("varianceOf", xs));
}

/** Running maximum seeded with the first argument; ties keep the earlier one. */
export function maxOf(...xs: NonEmpty<number>): number;
export function maxOf(...xs: NonEmpty<bigint>): bigint;
export function maxOf(...xs: NonEmpty<number | bigint>): number;
export function maxOf(...xs: unknown[]): number | bigint {
  return maxArguments(checkArguments("maxOf", xs));
}

/**
 * Run a variadic reduction over an argument list of unknown types. The
 * list is validated exactly as the typed forms validate theirs.
 */
export function reduceArguments(
  operation: VariadicOperation,
  args: readonly unknown[],
): number | bigint {
  return CORES[operation](checkArguments(operation, args));
}
