/**
 * @fileoverview Result and Outcome types for explicit error handling
 *
 * `Result<T, E>` wraps a call that may fail. `Outcome<T>` is what a pipeline
 * stage hands on: always a usable value, tagged `degraded` when the stage
 * had to fall back.
 */

import type { MarqueeError } from './errors.js';

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap an async function in a Result
 */
export async function safeAsync<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

// ============================================================================
// STAGE OUTCOMES
// ============================================================================

export type FullOutcome<T> = { readonly status: 'ok'; readonly value: T };
export type DegradedOutcome<T> = {
  readonly status: 'degraded';
  readonly value: T;
  readonly reason: MarqueeError;
};
export type Outcome<T> = FullOutcome<T> | DegradedOutcome<T>;

export const full = <T>(value: T): Outcome<T> => ({ status: 'ok', value });
export const degraded = <T>(value: T, reason: MarqueeError): Outcome<T> => ({
  status: 'degraded',
  value,
  reason,
});

export function isDegraded<T>(outcome: Outcome<T>): outcome is DegradedOutcome<T> {
  return outcome.status === 'degraded';
}
