import { describe, expect, it, vi } from 'vitest';
import { type Attempt, retry } from '../retry.ts';

describe('retry', () => {
  it('returns the first successful value', async () => {
    const attempt = vi.fn(async (n: number): Promise<Attempt<string>> =>
      n === 3 ? { ok: true, value: 'done' } : { ok: false, reason: `fail ${n}` });
    const onFailure = vi.fn();

    await expect(retry({ maxAttempts: 5, delayMs: 0 }, attempt, onFailure)).resolves.toBe('done');
    expect(attempt).toHaveBeenCalledTimes(3);
    expect(onFailure.mock.calls).toEqual([['fail 1', 1], ['fail 2', 2]]);
  });

  it('gives up after maxAttempts and resolves to null', async () => {
    const attempt = vi.fn(async (): Promise<Attempt<string>> => ({ ok: false, reason: 'HTTP 503' }));

    await expect(retry({ maxAttempts: 4, delayMs: 0 }, attempt)).resolves.toBeNull();
    expect(attempt).toHaveBeenCalledTimes(4);
  });

  it('counts a thrown error as a failed attempt', async () => {
    const onFailure = vi.fn();
    const attempt = vi.fn(async (n: number): Promise<Attempt<number>> => {
      if (n === 1) throw new Error('socket hang up');
      return { ok: true, value: n };
    });

    await expect(retry({ maxAttempts: 2, delayMs: 0 }, attempt, onFailure)).resolves.toBe(2);
    expect(onFailure).toHaveBeenCalledWith('socket hang up', 1);
  });

  it('always makes at least one attempt', async () => {
    const attempt = vi.fn(async (): Promise<Attempt<number>> => ({ ok: false, reason: 'no' }));

    await expect(retry({ maxAttempts: 0, delayMs: 0 }, attempt)).resolves.toBeNull();
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('waits between attempts but not after the last one', async () => {
    const started = Date.now();
    await retry({ maxAttempts: 3, delayMs: 25 }, async (): Promise<Attempt<number>> => ({ ok: false, reason: 'no' }));
    const elapsed = Date.now() - started;

    expect(elapsed).toBeGreaterThanOrEqual(45);
    expect(elapsed).toBeLessThan(1000);
  });
});
