/**
 * Deterministic name matching.
 */

/**
 * Pick the candidate that best matches `target`.
 *
 * An exact case-insensitive match wins. Otherwise candidates where either
 * string contains the other are considered and the shortest one wins,
 * earlier candidates first on equal length.
 */
export function bestMatch(
  target: string,
  candidates: readonly string[],
): string | undefined {
  if (!target || candidates.length === 0) return undefined;

  const needle = target.toLowerCase();

  const exact = candidates.find((c) => c.toLowerCase() === needle);
  if (exact !== undefined) return exact;

  const partial = candidates.filter((c) => {
    const lower = c.toLowerCase();
    return lower.includes(needle) || needle.includes(lower);
  });

  return partial.sort((a, b) => a.length - b.length)[0];
}
