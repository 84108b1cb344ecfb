export function median(nums: number[]): number | null {
  if (!nums.length) return null;
  const sorted = [...nums].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid];
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

export function mean(nums: number[]): number | null {
  if (!nums.length) return null;
  let sum = 0;
  for (const n of nums) sum += n;
  return sum / nums.length;
}

/**
 * Standard competition ranking ("1224"): equal values share the lowest rank and
 * the next distinct value skips ahead by the size of the tie.
 */
export function competitionRanks<T>(items: T[], value: (item: T) => number, tieBreak: (a: T, b: T) => number): { item: T; rank: number }[] {
  const sorted = [...items].sort((a, b) => value(b) - value(a) || tieBreak(a, b));
  const out: { item: T; rank: number }[] = [];
  let rank = 0;
  let prev: number | null = null;
  sorted.forEach((item, idx) => {
    const v = value(item);
    if (prev === null || v !== prev) {
      rank = idx + 1;
      prev = v;
    }
    out.push({ item, rank });
  });
  return out;
}

export function round(n: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}
