/**
 * Reduction Errors
 *
 * Two failure kinds:
 * - TYPE_INELIGIBLE: a domain, element or argument lacks a capability
 * - EMPTY_INPUT:     mean, variance or max over nothing
 *
 * `attempt` reports either as a result value instead of a throw.
 */

import type { Capability } from "./capabilities.js";

export type NumericErrorCode = "TYPE_INELIGIBLE" | "EMPTY_INPUT";

export class NumericError extends Error {
  constructor(
    readonly code: NumericErrorCode,
    readonly operation: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The element, argument or domain lacks the capability the operation needs. */
export class TypeIneligibleError extends NumericError {
  constructor(
    operation: string,
    readonly capability: Capability,
    message: string,
    readonly index?: number,
  ) {
    super("TYPE_INELIGIBLE", operation, message);
  }
}

/** `mean`, `variance` or `max` over nothing. */
export class EmptyInputError extends NumericError {
  constructor(operation: string) {
    super("EMPTY_INPUT", operation, `${operation}: input is empty`);
  }
}

// ── Result form ────────────────────────────────────────────────────

export type Reduction<T> =
  | { success: true; value: T }
  | { success: false; error: NumericError };

/**
 * Run a reduction and report a `NumericError` as a failed result instead
 * of throwing. Any other error is rethrown.
 */
export function attempt<T>(run: () => T): Reduction<T> {
  try {
    return { success: true, value: run() };
  } catch (error) {
    if (error instanceof NumericError) return { success: false, error };
    throw error;
  }
}
