interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Ratcliff/Obershelp gestalt similarity of two strings, compared
 * case-insensitively: `2 * M / (|a| + |b|)` where M is the total length of
 * the recursively found longest common substrings.
 *
 * Two empty strings are identical (1.0).
 */
export function similarity(first: string, second: string): number {
  const a = first.toLowerCase();
  const b = second.toLowerCase();
  const total = a.length + b.length;
  if (total === 0) return 1;

  return (2 * matchedLength(a, b)) / total;
}

function matchedLength(a: string, b: string): number {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;

    const block = longestCommonBlock(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    matched += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      pending.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      pending.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }

  return matched;
}

// Longest common substring of a[aLo..aHi) and b[bLo..bHi). Among equally long
// blocks the one starting earliest in `a` wins, then earliest in `b`.
function longestCommonBlock(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  let previous = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const current = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;

      const size = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}
