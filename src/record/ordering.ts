function asNumber(label: string): number | null {
  if (label.trim() === '') return null;
  const value = Number(label);
  return Number.isFinite(value) ? value : null;
}

function lexical(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Numeric labels first, in numeric order; everything else lexically after them. */
export function compareLabels(a: string, b: string): number {
  const left = asNumber(a);
  const right = asNumber(b);

  if (left !== null && right !== null) {
    return left - right || lexical(a, b);
  }
  if (left !== null) return -1;
  if (right !== null) return 1;
  return lexical(a, b);
}

export function sortLabels(labels: Iterable<string>): string[] {
  return [...labels].toSorted(compareLabels);
}

export function byVolumeThenChapter<T extends { volume: string; number: string }>(a: T, b: T): number {
  return compareLabels(a.volume, b.volume) || compareLabels(a.number, b.number);
}
