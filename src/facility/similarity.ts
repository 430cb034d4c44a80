/**
 * Sequence similarity (Ratcliff/Obershelp).
 *
 * ratio = 2·M / (|a| + |b|), where M is the total size of the matching blocks
 * found by recursively taking the longest common substring and repeating on
 * the unmatched pieces to its left and right.
 */

export interface CloseMatch {
  candidate: string;
  score: number;
}

/** Index of every position of each character in `b`. */
function indexPositions(b: string): Map<string, number[]> {
  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b[j];
    const positions = b2j.get(ch);
    if (positions) positions.push(j);
    else b2j.set(ch, [j]);
  }
  return b2j;
}

/**
 * Longest common substring of a[alo:ahi] and b[blo:bhi]. Ties go to the
 * block starting earliest in `a`, then earliest in `b`.
 */
function longestMatch(
  a: string,
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): [number, number, number] {
  let besti = alo;
  let bestj = blo;
  let bestsize = 0;
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestsize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestsize = k;
      }
    }
    j2len = next;
  }
  return [besti, bestj, bestsize];
}

/** Total number of characters in matching blocks between `a` and `b`. */
export function matchingCharacters(a: string, b: string): number {
  const b2j = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (queue.length > 0) {
    const [alo, ahi, blo, bhi] = queue.pop() ?? [0, 0, 0, 0];
    const [i, j, k] = longestMatch(a, b2j, alo, ahi, blo, bhi);
    if (k === 0) continue;
    matched += k;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + k < ahi && j + k < bhi) queue.push([i + k, ahi, j + k, bhi]);
  }
  return matched;
}

/** Similarity in [0, 1]; two empty strings are identical. */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

/**
 * Best candidates scoring at least `cutoff` against `word`, highest first.
 * Equal scores are ordered by candidate, descending. Comparison is
 * case-sensitive.
 */
export function closeMatches(
  word: string,
  candidates: readonly string[],
  limit: number,
  cutoff: number,
): CloseMatch[] {
  if (limit <= 0) return [];
  const scored: CloseMatch[] = [];
  for (const candidate of candidates) {
    const score = similarityRatio(candidate, word);
    if (score >= cutoff) scored.push({ candidate, score });
  }
  scored.sort((x, y) =>
    y.score - x.score || (x.candidate < y.candidate ? 1 : x.candidate > y.candidate ? -1 : 0),
  );
  return scored.slice(0, limit);
}
