export type CloseMatch = {
  candidate: string;
  score: number;
};

/**
 * Ratcliff/Obershelp similarity: twice the number of matched characters over the
 * combined length, where matches are found by repeatedly taking the longest common
 * run and recursing into the unmatched text on either side of it.
 */
export function similarityRatio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const combinedLength = left.length + right.length;
  if (combinedLength === 0) {
    return 1;
  }
  return (2 * countMatchedCharacters(left, right)) / combinedLength;
}

export function findClosestMatch(
  word: string,
  candidates: readonly string[],
  cutoff: number,
): CloseMatch | null {
  let best: CloseMatch | null = null;

  for (const candidate of candidates) {
    const score = similarityRatio(candidate, word);
    if (score < cutoff) {
      continue;
    }
    if (
      !best ||
      score > best.score ||
      (score === best.score && candidate > best.candidate)
    ) {
      best = { candidate, score };
    }
  }

  return best;
}

function countMatchedCharacters(a: string[], b: string[]): number {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) {
      break;
    }
    const [aLow, aHigh, bLow, bHigh] = range;
    const { aStart, bStart, size } = findLongestRun(a, b, aLow, aHigh, bLow, bHigh);
    if (size === 0) {
      continue;
    }

    matched += size;
    if (aLow < aStart && bLow < bStart) {
      pending.push([aLow, aStart, bLow, bStart]);
    }
    if (aStart + size < aHigh && bStart + size < bHigh) {
      pending.push([aStart + size, aHigh, bStart + size, bHigh]);
    }
  }

  return matched;
}

// Earliest run in `a` wins a tie, then earliest in `b`.
function findLongestRun(
  a: string[],
  b: string[],
  aLow: number,
  aHigh: number,
  bLow: number,
  bHigh: number,
): { aStart: number; bStart: number; size: number } {
  let best = { aStart: aLow, bStart: bLow, size: 0 };
  let previous = new Map<number, number>();

  for (let i = aLow; i < aHigh; i += 1) {
    const current = new Map<number, number>();
    for (let j = bLow; j < bHigh; j += 1) {
      if (a[i] !== b[j]) {
        continue;
      }
      const length = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, length);
      if (length > best.size) {
        best = { aStart: i - length + 1, bStart: j - length + 1, size: length };
      }
    }
    previous = current;
  }

  return best;
}
