import { describe, expect, it } from 'vitest';
import { DEFAULT_OPTIONS, resolveOptions } from '../config.ts';

describe('resolveOptions', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it('merges nested retry and label overrides', () => {
    const options = resolveOptions({ imageQuality: 60, retry: { delayMs: 0 }, labels: { volume: 'Volume' } });

    expect(options.imageQuality).toBe(60);
    expect(options.retry).toEqual({ maxAttempts: 5, delayMs: 0 });
    expect(options.labels.volume).toBe('Volume');
    expect(options.labels.chapter).toBe('Глава');
    expect(DEFAULT_OPTIONS.retry.delayMs).toBe(1000);
  });
});
