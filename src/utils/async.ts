/**
 * @fileoverview Async Utilities
 *
 * Bounded waits for calls into the graph store and vector index.
 *
 * @packageDocumentation
 */

import { MarqueeError, type ErrorJSON } from '../core/errors.js';

/**
 * Error thrown when an external call does not settle in time.
 */
export class TimeoutError extends MarqueeError {
  readonly code = 'TIMEOUT';
  readonly retryable = true;

  constructor(
    readonly timeoutMs: number,
    readonly context?: string,
  ) {
    super(context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        timeoutMs: this.timeoutMs,
        context: this.context,
      },
    };
  }
}

/**
 * Run `task` and reject with a TimeoutError if it has not settled after
 * `timeoutMs`. A missing, non-finite or non-positive timeout waits forever.
 * Synchronous throws from `task` surface as rejections.
 *
 * @example
 * ```typescript
 * const rows = await withTimeout(() => store.query(pattern, filters, exclude), 5000, 'genre query');
 * ```
 */
export async function withTimeout<T>(
  task: () => Promise<T> | T,
  timeoutMs?: number,
  context?: string
): Promise<T> {
  const promise = Promise.resolve().then(task);
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
