/**
 * Ratcliff/Obershelp similarity: 2 * M / T, where M is the number of
 * characters in the matching blocks and T the combined length of both strings.
 * Returns 1 for two empty strings.
 *
 * There is no popular-character heuristic: in strings of 200 or more
 * characters, frequent characters still take part in matches.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatchingCharacters(a, b)) / total;
}

/** Sum of the sizes of all matching blocks between `a` and `b`. */
export function countMatchingCharacters(a: string, b: string): number {
  const positionsInB = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = positionsInB.get(b[j]);
    if (list) list.push(j);
    else positionsInB.set(b[j], [j]);
  }

  let matched = 0;
  const queue: [number, number, number, number][] = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const [i, j, size] = longestMatch(a, positionsInB, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }

  return matched;
}

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi]; ties go to the block
 * that starts earliest in `a`, then earliest in `b`.
 */
function longestMatch(
  a: string,
  positionsInB: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): [number, number, number] {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextLengths = new Map<number, number>();
    for (const j of positionsInB.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (lengths.get(j - 1) ?? 0) + 1;
      nextLengths.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    lengths = nextLengths;
  }

  return [bestI, bestJ, bestSize];
}
