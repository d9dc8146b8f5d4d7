// src/matching/similarity.ts

/** Levenshtein distance over code points, two-row DP. */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  const s = Array.from(a);
  const t = Array.from(b);
  if (!s.length) return t.length;
  if (!t.length) return s.length;

  let prev = Array.from({ length: t.length + 1 }, (_, j) => j);
  let cur = new Array<number>(t.length + 1).fill(0);
  for (let i = 1; i <= s.length; i++) {
    cur[0] = i;
    for (let j = 1; j <= t.length; j++) {
      const cost = s[i - 1] === t[j - 1] ? 0 : 1;
      cur[j] = Math.min(prev[j] + 1, cur[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, cur] = [cur, prev];
  }
  return prev[t.length];
}

/**
 * Case-insensitive similarity: 1 - distance / max(length).
 * 1 means identical; two empty names count as identical.
 */
export function nameSimilarity(name1: string, name2: string): number {
  const a = name1.toLowerCase();
  const b = name2.toLowerCase();
  const maxLength = Math.max(Array.from(a).length, Array.from(b).length);
  if (maxLength === 0) return 1;
  return 1 - levenshtein(a, b) / maxLength;
}
