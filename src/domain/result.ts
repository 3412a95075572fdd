import type { EventWireError } from './errors.js';

/**
 * Outcome of a single validation or decode step.
 *
 * `ok === true` carries the value; `ok === false` carries the typed error
 * so callers decide whether to throw, skip or alert.
 */
export type GateResult<T, E extends EventWireError = EventWireError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): GateResult<T, never> {
  return { ok: true, value };
}

export function fail<E extends EventWireError>(error: E): GateResult<never, E> {
  return { ok: false, error };
}
