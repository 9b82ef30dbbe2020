/**
 * Suggestion helpers
 * Pure functions used to point at the intended field when an override names
 * one that does not exist.
 */

/**
 * Levenshtein distance between two strings
 */
export function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j);

  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      const substitution =
        (previous[j - 1] ?? 0) + (b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1);
      current[j] = Math.min(
        substitution,
        (current[j - 1] ?? 0) + 1, // insertion
        (previous[j] ?? 0) + 1 // deletion
      );
    }
    previous = current;
  }

  return previous[a.length] ?? 0;
}

/**
 * Closest candidate within `maxDistance` edits, compared case-insensitively.
 * Ties go to the candidate listed first.
 */
export function didYouMean(
  input: string,
  candidates: readonly string[],
  maxDistance = 2
): string | undefined {
  const lower = input.toLowerCase();
  let best: string | undefined;
  let bestDistance = maxDistance + 1;

  for (const candidate of candidates) {
    const distance = levenshteinDistance(lower, candidate.toLowerCase());
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}
