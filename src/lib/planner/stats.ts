export function round2(value: number) {
  return Math.round(value * 100) / 100;
}

export function average(values: readonly number[]) {
  if (values.length === 0) return 0;
  return round2(values.reduce((sum, value) => sum + value, 0) / values.length);
}

export function ratio(part: number, whole: number) {
  if (whole <= 0) return 0;
  return round2(part / whole);
}

/** Groups in first-seen order. */
export function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

export function byName(a: string, b: string) {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
