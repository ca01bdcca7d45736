import { setTimeout as sleep } from 'node:timers/promises';
import type { RetryPolicy } from '../config.ts';
import { describeError } from '../errors.ts';

export type Attempt<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Runs `attempt` until it succeeds or `policy.maxAttempts` is reached, sleeping
 * `policy.delayMs` between attempts. A thrown error counts as a failed attempt.
 * Resolves to `null` once every attempt has failed; never rejects.
 */
export async function retry<T>(
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<Attempt<T>>,
  onFailure?: (reason: string, attemptNumber: number) => void,
): Promise<T | null> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
    let outcome: Attempt<T>;
    try {
      outcome = await attempt(attemptNumber);
    } catch (error) {
      outcome = { ok: false, reason: describeError(error) };
    }

    if (outcome.ok) {
      return outcome.value;
    }

    onFailure?.(outcome.reason, attemptNumber);

    if (attemptNumber < maxAttempts && policy.delayMs > 0) {
      await sleep(policy.delayMs);
    }
  }

  return null;
}
