/**
 * Numeric Capabilities
 *
 * A domain is a dictionary object describing one element type: its
 * identity value, an element guard, and the arithmetic it supports.
 * Each reduction bounds its generic parameter by the capability
 * interfaces it needs, so an ineligible domain fails to type-check;
 * `requireCapability` repeats the check at run time for untyped callers.
 */

import { TypeIneligibleError } from "./errors.js";

export type NumericKind = "integral" | "floating";

export type Capability = "addable" | "widenable" | "divisible" | "comparable";

export interface NumericDomain<T> {
  readonly name: string;
  readonly kind: NumericKind;
  readonly zero: T;
  isElement(value: unknown): value is T;
}

export interface Addable<T> extends NumericDomain<T> {
  add(a: T, b: T): T;
}

/** Widening to the double working precision. */
export interface Widenable<T> extends NumericDomain<T> {
  toDouble(value: T): number;
}

/** Division of a total by an unsigned element count, result in `T`. */
export interface Divisible<T> extends Addable<T>, Widenable<T> {
  divide(total: T, count: number): T;
}

/** Numeric, non-character ordering. */
export interface Comparable<T> extends Widenable<T> {
  greaterThan(a: T, b: T): boolean;
}

export interface Arithmetic<T, K extends NumericKind = NumericKind>
  extends Divisible<T>,
    Comparable<T> {
  readonly kind: K;
}

// ── Runtime check ──────────────────────────────────────────────────

type CapabilityMember = "add" | "toDouble" | "divide" | "greaterThan";

const CAPABILITY_MEMBERS: Record<Capability, readonly CapabilityMember[]> = {
  addable: ["add"],
  widenable: ["toDouble"],
  divisible: ["add", "toDouble", "divide"],
  comparable: ["toDouble", "greaterThan"],
};

function missingMembers(
  domain: Partial<Arithmetic<unknown>>,
  capability: Capability,
): CapabilityMember[] {
  return CAPABILITY_MEMBERS[capability].filter((member) => typeof domain[member] !== "function");
}

export function hasCapability(domain: Partial<Arithmetic<unknown>>, capability: Capability): boolean {
  return missingMembers(domain, capability).length === 0;
}

/**
 * Throw `TypeIneligibleError` unless `domain` provides every member the
 * capability needs.
 */
export function requireCapability(
  operation: string,
  domain: NumericDomain<unknown>,
  ...capabilities: Capability[]
): void {
  for (const capability of capabilities) {
    const missing = missingMembers(domain, capability);
    if (missing.length === 0) continue;
    throw new TypeIneligibleError(
      operation,
      capability,
      `${operation}: domain "${domain.name}" is not ${capability} (missing ${missing.join(", ")})`,
    );
  }
}
