/**
 * Built-in Domains
 *
 * float64 — JS numbers, floating (NaN and infinities included).
 * int     — JS numbers holding integers; division truncates toward zero.
 * bigInt  — JS bigints; division is bigint division.
 *
 * Element guards are zod schemas. Text is an element of none of them.
 */

import { z } from "zod";
import type { Arithmetic, NumericDomain } from "./capabilities.js";

// ── Element Schemas ────────────────────────────────────────────────

export const FloatElementSchema = z.union([z.number(), z.nan()]);
export const IntElementSchema = z.number().int();
export const BigIntElementSchema = z.bigint();

// ── Domains ────────────────────────────────────────────────────────

export const float64: Arithmetic<number, "floating"> = {
  name: "float64",
  kind: "floating",
  zero: 0,
  isElement: (value: unknown): value is number => FloatElementSchema.safeParse(value).success,
  add: (a, b) => a + b,
  divide: (total, count) => total / count,
  toDouble: (value) => value,
  greaterThan: (a, b) => a > b,
};

export const int: Arithmetic<number, "integral"> = {
  name: "int",
  kind: "integral",
  zero: 0,
  isElement: (value: unknown): value is number => IntElementSchema.safeParse(value).success,
  add: (a, b) => a + b,
  divide: (total, count) => Math.trunc(total / count),
  toDouble: (value) => value,
  greaterThan: (a, b) => a > b,
};

export const bigInt: Arithmetic<bigint, "integral"> = {
  name: "bigint",
  kind: "integral",
  zero: 0n,
  isElement: (value: unknown): value is bigint => BigIntElementSchema.safeParse(value).success,
  add: (a, b) => a + b,
  divide: (total, count) => total / BigInt(count),
  toDouble: (value) => Number(value),
  greaterThan: (a, b) => a > b,
};

// ── Sequences ──────────────────────────────────────────────────────

/** Ordered, finite, read-only view with a length and positional access. */
export type Sequence<T> = ArrayLike<T> & Iterable<T>;

export type IntegralArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array;

export type FloatingArray = Float32Array | Float64Array;

export type BigIntArray = BigInt64Array | BigUint64Array;

export type FloatSequence = readonly number[] | FloatingArray;

export type NumberSequence = FloatSequence | IntegralArray;

export function isIntegralArray(seq: unknown): seq is IntegralArray {
  return (
    seq instanceof Int8Array ||
    seq instanceof Uint8Array ||
    seq instanceof Uint8ClampedArray ||
    seq instanceof Int16Array ||
    seq instanceof Uint16Array ||
    seq instanceof Int32Array ||
    seq instanceof Uint32Array
  );
}

export function isBigIntArray(seq: unknown): seq is BigIntArray {
  return seq instanceof BigInt64Array || seq instanceof BigUint64Array;
}

/**
 * The domain a sequence implies when the caller gives none: bigint typed
 * arrays are `bigInt`, integer typed arrays are `int`, anything else is
 * read as `float64` and its elements checked against it.
 */
export function inferDomain(seq: unknown): Arithmetic<number> | Arithmetic<bigint> {
  if (isBigIntArray(seq)) return bigInt;
  if (isIntegralArray(seq)) return int;
  return float64;
}

export function domainName(domain: NumericDomain<unknown>): string {
  return `${domain.name} (${domain.kind})`;
}
