/**
 * Sequence similarity (Ratcliff/Obershelp)
 *
 * Finds the longest contiguous matching block, then recurses on the pieces to
 * its left and right. ratio = 2 * matched / (len(a) + len(b)). Order matters:
 * reordered content matches in fewer, shorter blocks, while a single
 * substituted token only splits one block in two.
 *
 * No junk heuristic is applied; every token is significant.
 */

export interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

function indexPositions<T>(b: readonly T[]): Map<T, number[]> {
  const b2j = new Map<T, number[]>();
  b.forEach((item, j) => {
    const positions = b2j.get(item);
    if (positions) {
      positions.push(j);
    } else {
      b2j.set(item, [j]);
    }
  });
  return b2j;
}

function longestMatch<T>(
  a: readonly T[],
  b2j: Map<T, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;

  // j2len[j] = length of the longest match ending at a[i - 1] and b[j]
  let j2len = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    j2len = next;
  }

  return { a: bestI, b: bestJ, size: bestSize };
}

export function matchingBlocks<T>(a: readonly T[], b: readonly T[]): MatchingBlock[] {
  const b2j = indexPositions(b);
  const blocks: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const match = longestMatch(a, b2j, alo, ahi, blo, bhi);
    if (match.size === 0) continue;

    blocks.push(match);
    if (alo < match.a && blo < match.b) {
      queue.push([alo, match.a, blo, match.b]);
    }
    if (match.a + match.size < ahi && match.b + match.size < bhi) {
      queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
    }
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

export function sequenceRatio<T>(a: readonly T[], b: readonly T[]): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const matched = matchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}
