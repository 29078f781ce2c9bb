/**
 * Tagged result for values that may be missing.
 *
 * Lookups and numeric conversions return an `Outcome` instead of a sentinel
 * (`NaN`, `0`, `null`), so a missing number cannot flow into arithmetic
 * unnoticed.
 */

export type Outcome<T> =
  | { readonly kind: 'value'; readonly value: T }
  | { readonly kind: 'unavailable'; readonly reason: string };

export function available<T>(value: T): Outcome<T> {
  return { kind: 'value', value };
}

export function unavailable<T>(reason: string): Outcome<T> {
  return { kind: 'unavailable', reason };
}

export function isAvailable<T>(
  outcome: Outcome<T>,
): outcome is { readonly kind: 'value'; readonly value: T } {
  return outcome.kind === 'value';
}

/** Return the value, or `fallback` when unavailable. */
export function valueOr<T, F>(outcome: Outcome<T>, fallback: F): T | F {
  return outcome.kind === 'value' ? outcome.value : fallback;
}

/** Apply `fn` to an available value; unavailable outcomes pass through. */
export function mapOutcome<T, U>(outcome: Outcome<T>, fn: (value: T) => U): Outcome<U> {
  return outcome.kind === 'value' ? available(fn(outcome.value)) : outcome;
}
