/**
 * String similarity used for "Did you mean?" diagnostics on unknown
 * fixture names.
 */

/**
 * Levenshtein edit distance between two strings, computed with two rows.
 *
 * @example
 * levenshteinDistance('fsat', 'fast');  // 2
 * levenshteinDistance('fsat', 'fetch'); // 4
 */
export function levenshteinDistance(a: string, b: string): number {
  // Keep `a` the shorter one so the rows stay small
  if (a.length > b.length) [a, b] = [b, a];

  const m = a.length;
  const n = b.length;
  if (m === 0) return n;

  let prev: number[] = Array.from({ length: m + 1 }, (_, j) => j);
  let curr: number[] = new Array<number>(m + 1).fill(0);

  for (let i = 1; i <= n; i++) {
    curr[0] = i;
    for (let j = 1; j <= m; j++) {
      const cost = a[j - 1] === b[i - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[m];
}

/**
 * Closest candidate to `needle`, or undefined when there are no candidates.
 *
 * There is no distance cut-off: any registered name is a better hint than
 * none. Ties go to the alphabetically first candidate so the output is
 * stable.
 */
export function closestName(needle: string, candidates: Iterable<string>): string | undefined {
  let best: string | undefined;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const distance = levenshteinDistance(needle, candidate);
    if (
      distance < bestDistance ||
      (distance === bestDistance && best !== undefined && candidate.localeCompare(best) < 0)
    ) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
}
