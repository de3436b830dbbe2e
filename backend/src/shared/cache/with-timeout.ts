/**
 * src/shared/cache/with-timeout.ts
 *
 * Races a cache call against a timer. The timer is always cleared so a fast
 * call never leaves a pending handle behind.
 */

import { CacheUnavailableError } from './cache';

/** A timed-out call counts as an unavailable cache. */
export class CacheTimeoutError extends CacheUnavailableError {
  constructor(readonly timeoutMs: number) {
    super(`Cache call timed out after ${timeoutMs}ms`);
    this.name = 'CacheTimeoutError';
  }
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new CacheTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
