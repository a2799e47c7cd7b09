/**
 * Collection Reductions
 *
 * sum, mean, variance, max and transformReduce over a sequence. The
 * domain is inferred from typed arrays and plain number arrays, and is
 * passed explicitly for anything else (a plain bigint[], integer
 * semantics over a number[], a custom element type).
 *
 * The integral/floating branch is picked once per call from
 * `domain.kind`:
 *   mean     — integral: divide(sum, n) in the element type (truncating)
 *              floating: widened sum / n
 *   variance — real mean in both branches, squared deviations in double
 */

import type {
  Addable,
  Arithmetic,
  Comparable,
  Divisible,
  NumericDomain,
  Widenable,
} from "./capabilities.js";
import { requireCapability } from "./capabilities.js";
import type {
  BigIntArray,
  FloatSequence,
  IntegralArray,
  NumberSequence,
  Sequence,
} from "./domains.js";
import { float64, inferDomain } from "./domains.js";
import { TypeIneligibleError } from "./errors.js";
import { checkElements, checkSequence, describeValue, requireNonEmpty } from "./guard.js";

function resolveDomain<D extends NumericDomain<unknown>>(
  seq: unknown,
  domain: D | undefined,
): D | Arithmetic<number> | Arithmetic<bigint> {
  return domain ?? inferDomain(seq);
}

function fold<T>(seq: Iterable<T>, domain: Addable<T>): T {
  let result = domain.zero;
  for (const value of seq) result = domain.add(result, value);
  return result;
}

function widenedMean<T>(seq: Sequence<T>, domain: Widenable<T>): number {
  let total = 0;
  for (const value of seq) total += domain.toDouble(value);
  return total / seq.length;
}

// ── sum ────────────────────────────────────────────────────────────

/** Additive fold from the domain's zero. Empty input gives zero. */
export function sum(seq: NumberSequence): number;
export function sum(seq: BigIntArray): bigint;
export function sum<T>(seq: Sequence<T>, domain: Addable<T>): T;
export function sum<T>(seq: Sequence<T>, domain?: Addable<T>): unknown {
  const resolved: Addable<unknown> = resolveDomain(seq, domain);
  requireCapability("sum", resolved, "addable");
  checkElements("sum", "addable", seq, resolved);
  return fold<unknown>(seq, resolved);
}

// ── mean ───────────────────────────────────────────────────────────

export function mean(seq: FloatSequence): number;
export function mean(seq: IntegralArray): number;
export function mean(seq: BigIntArray): bigint;
export function mean<T>(seq: Sequence<T>, domain: Divisible<T> & { readonly kind: "integral" }): T;
export function mean<T>(seq: Sequence<T>, domain: Divisible<T> & { readonly kind: "floating" }): number;
export function mean<T>(seq: Sequence<T>, domain: Divisible<T>): T | number;
export function mean<T>(seq: Sequence<T>, domain?: Divisible<T>): unknown {
  const resolved: Divisible<unknown> = resolveDomain(seq, domain);
  requireCapability("mean", resolved, "divisible");
  checkElements("mean", "divisible", seq, resolved);
  requireNonEmpty("mean", seq);

  if (resolved.kind === "integral") {
    return resolved.divide(fold<unknown>(seq, resolved), seq.length);
  }
  return widenedMean<unknown>(seq, resolved);
}

// ── variance ───────────────────────────────────────────────────────

/** Population variance (divides by n), always a double. */
export function variance(seq: NumberSequence | BigIntArray): number;
export function variance<T>(seq: Sequence<T>, domain: Addable<T> & Widenable<T>): number;
export function variance<T>(seq: Sequence<T>, domain?: Addable<T> & Widenable<T>): number {
  const resolved: Addable<unknown> & Widenable<unknown> = resolveDomain(seq, domain);
  requireCapability("variance", resolved, "addable", "widenable");
  checkElements("variance", "addable", seq, resolved);
  requireNonEmpty("variance", seq);

  const count = seq.length;
  const mu =
    resolved.kind === "integral"
      ? resolved.toDouble(fold<unknown>(seq, resolved)) / count
      : widenedMean<unknown>(seq, resolved);

  let acc = 0;
  for (const value of seq) {
    const d = resolved.toDouble(value) - mu;
    acc += d * d;
  }
  return acc / count;
}

// ── max ────────────────────────────────────────────────────────────

/** Greatest element; on ties the first one seen is kept. */
export function max(seq: NumberSequence): number;
export function max(seq: BigIntArray): bigint;
export function max<T>(seq: Sequence<T>, domain: Comparable<T>): T;
export function max<T>(seq: Sequence<T>, domain?: Comparable<T>): unknown {
  const resolved: Comparable<unknown> = resolveDomain(seq, domain);
  requireCapability("max", resolved, "comparable");
  checkElements("max", "comparable", seq, resolved);
  requireNonEmpty("max", seq);

  let result = seq[0];
  for (let i = 1; i < seq.length; i++) {
    if (resolved.greaterThan(seq[i], result)) result = seq[i];
  }
  return result;
}

// ── transformReduce ────────────────────────────────────────────────

/**
 * Map every element through `fn` and fold the results with `into`.
 * Without `into` the results must be numbers and fold as float64.
 * Empty input gives the zero of the result domain.
 */
export function transformReduce<T>(
  seq: Sequence<T>,
  fn: (value: T, index: number) => number,
): number;
export function transformReduce<T, R>(
  seq: Sequence<T>,
  fn: (value: T, index: number) => R,
  into: Addable<R>,
): R;
export function transformReduce<T, R>(
  seq: Sequence<T>,
  fn: (value: T, index: number) => R,
  into?: Addable<R>,
): R | number {
  checkSequence("transformReduce", "addable", seq, "input");
  if (into === undefined) {
    return mapFold<T, number>(seq, (value, index) => {
      const mapped = fn(value, index);
      if (typeof mapped !== "number") {
        throw new TypeIneligibleError(
          "transformReduce",
          "addable",
          `transformReduce: result ${index} (${describeValue(mapped)}) is not a number; pass a result domain to fold other types`,
          index,
        );
      }
      return mapped;
    }, float64);
  }

  const target = into;
  requireCapability("transformReduce", target, "addable");
  return mapFold<T, R>(seq, (value, index) => {
    const mapped = fn(value, index);
    if (!target.isElement(mapped)) {
      throw new TypeIneligibleError(
        "transformReduce",
        "addable",
        `transformReduce: result ${index} (${describeValue(mapped)}) is not a ${target.name} value`,
        index,
      );
    }
    return mapped;
  }, target);
}

function mapFold<T, R>(seq: Sequence<T>, fn: (value: T, index: number) => R, into: Addable<R>): R {
  let result = into.zero;
  for (let i = 0; i < seq.length; i++) {
    result = into.add(result, fn(seq[i], i));
  }
  return result;
}
