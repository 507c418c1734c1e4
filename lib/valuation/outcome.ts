import type { ValuationError } from './errors';

/**
 * Tagged success/failure value returned across engine boundaries in place of
 * letting non-finite numbers flow downstream.
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: ValuationError };

export const succeed = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const fail = (error: ValuationError): Outcome<never> => ({ ok: false, error });

/**
 * Returns the value or throws the carried ValuationError.
 */
export function unwrap<T>(outcome: Outcome<T>): T {
  if (outcome.ok) return outcome.value;
  throw outcome.error;
}
