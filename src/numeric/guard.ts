/**
 * Boundary Guards
 *
 * Every reduction validates its whole input before the first arithmetic
 * step, so an ineligible element never yields a partial result.
 */

import { z } from "zod";
import type { Capability, NumericDomain } from "./capabilities.js";
import { domainName } from "./domains.js";
import { EmptyInputError, TypeIneligibleError } from "./errors.js";

/** Short description of a rejected value for diagnostics. */
export function describeValue(value: unknown): string {
  if (typeof value === "string") {
    return value.length === 1 ? `character '${value}'` : `text "${value}"`;
  }
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "number") {
    return Number.isInteger(value) ? `number ${value}` : `non-integral number ${value}`;
  }
  if (typeof value === "bigint") return `bigint ${value}n`;
  if (typeof value === "object") return Array.isArray(value) ? "array" : "object";
  return typeof value;
}

function isSequenceLike(value: unknown): value is ArrayLike<unknown> & Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "length" in value &&
    typeof value.length === "number" &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * Check the input is a sequence. Strings are refused: they iterate as
 * characters.
 */
export function checkSequence(
  operation: string,
  capability: Capability,
  seq: unknown,
  expected: string,
): asserts seq is ArrayLike<unknown> & Iterable<unknown> {
  if (!isSequenceLike(seq)) {
    throw new TypeIneligibleError(
      operation,
      capability,
      `${operation}: expected a sequence of ${expected} values, got ${describeValue(seq)}`,
    );
  }
}

/** Check the input is a sequence and that every element belongs to the domain. */
export function checkElements(
  operation: string,
  capability: Capability,
  seq: unknown,
  domain: NumericDomain<unknown>,
): void {
  checkSequence(operation, capability, seq, domainName(domain));
  let index = 0;
  for (const value of seq) {
    if (!domain.isElement(value)) {
      throw new TypeIneligibleError(
        operation,
        capability,
        `${operation}: element ${index} (${describeValue(value)}) is not a ${domainName(domain)} value; ${capability} requires a numeric, non-character element type`,
        index,
      );
    }
    index += 1;
  }
}

export function requireNonEmpty(operation: string, seq: ArrayLike<unknown>): void {
  if (seq.length === 0) throw new EmptyInputError(operation);
}

// ── Variadic arguments ─────────────────────────────────────────────

export const NumericArgumentSchema = z.union([z.number(), z.nan(), z.bigint()]);

export const ArgumentListSchema = z.array(NumericArgumentSchema).min(1);

export type NumericArgument = z.infer<typeof NumericArgumentSchema>;

/**
 * Validate a variadic argument list: at least one argument, each a
 * number or bigint.
 */
export function checkArguments(operation: string, args: readonly unknown[]): NumericArgument[] {
  const parsed = ArgumentListSchema.safeParse(args);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  if (issue.code === "too_small" && issue.path.length === 0) {
    throw new EmptyInputError(operation);
  }
  const position = issue.path[0];
  const index = typeof position === "number" ? position : 0;
  throw new TypeIneligibleError(
    operation,
    "comparable",
    `${operation}: argument ${index} (${describeValue(args[index])}) is not numeric; comparable requires a numeric, non-character argument type`,
    index,
  );
}
