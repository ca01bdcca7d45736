import { describe, expect, it } from 'vitest';
import { byVolumeThenChapter, compareLabels, sortLabels } from '../ordering.ts';

describe('compareLabels', () => {
  it('orders numeric labels numerically, not lexically', () => {
    expect(sortLabels(['10', '2', '1.5', '1'])).toEqual(['1', '1.5', '2', '10']);
  });

  it('falls back to lexical order and puts non-numeric labels last', () => {
    expect(sortLabels(['b', '10', 'a', '2'])).toEqual(['2', '10', 'a', 'b']);
  });

  it('keeps differently written equal numbers apart deterministically', () => {
    expect(compareLabels('1', '1.0')).toBeLessThan(0);
    expect(compareLabels('1.0', '1')).toBeGreaterThan(0);
  });

  it('treats an empty label as non-numeric', () => {
    expect(sortLabels(['', '0'])).toEqual(['0', '']);
  });
});

describe('byVolumeThenChapter', () => {
  it('sorts by volume first and chapter number second', () => {
    const stubs = [
      { volume: '2', number: '1' },
      { volume: '1', number: '10' },
      { volume: '1', number: '9.5' },
    ];

    expect(stubs.toSorted(byVolumeThenChapter)).toEqual([
      { volume: '1', number: '9.5' },
      { volume: '1', number: '10' },
      { volume: '2', number: '1' },
    ]);
  });
});
