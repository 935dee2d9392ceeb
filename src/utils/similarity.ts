/**
 * Gestalt (Ratcliff/Obershelp) similarity between two strings.
 *
 * The ratio is `2 * M / T` where `M` is the number of characters in the
 * matching blocks found by recursively taking the longest common substring
 * and `T` is the combined length. Identical strings score 1, strings with
 * no character in common score 0. Comparison is case-sensitive; callers
 * lowercase first where that matters.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }

  return (2 * countMatchingCharacters(a, b)) / total;
}

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

type Range = [aLo: number, aHi: number, bLo: number, bHi: number];

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b[j];
    const list = positions.get(ch);
    if (list) {
      list.push(j);
    } else {
      positions.set(ch, [j]);
    }
  }
  return positions;
}

// Earliest longest block wins ties, scanning `a` left to right
function findLongestMatch(
  a: string,
  positions: Map<string, number[]>,
  [aLo, aHi, bLo, bHi]: Range
): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  let runEndingAt = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) {
        continue;
      }
      if (j >= bHi) {
        break;
      }
      const size = (runEndingAt.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    runEndingAt = next;
  }

  return best;
}

function countMatchingCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  const pending: Range[] = [[0, a.length, 0, b.length]];
  let matched = 0;

  for (let range = pending.pop(); range !== undefined; range = pending.pop()) {
    const block = findLongestMatch(a, positions, range);
    if (block.size === 0) {
      continue;
    }

    matched += block.size;
    const [aLo, aHi, bLo, bHi] = range;
    if (aLo < block.aStart && bLo < block.bStart) {
      pending.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      pending.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }

  return matched;
}
