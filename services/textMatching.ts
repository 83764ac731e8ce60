/**
 * TEXT MATCHING UTILITIES
 *
 * Regex escaping, fuzzy similarity and report text cleanup shared by the
 * vocabulary service, the extractors and the VAF enricher.
 */

/**
 * Escape a literal for use inside a RegExp source
 */
export const escapeRegExp = (literal: string): string =>
  literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Levenshtein edit distance (two-row dynamic programming)
 */
export const levenshteinDistance = (a: string, b: string): number => {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      );
    }
    previous = current;
  }
  return previous[b.length];
};

/**
 * Similarity in [0, 1]: 1 - distance / longer length
 */
export const similarityRatio = (a: string, b: string): number => {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshteinDistance(a, b) / longest;
};

/**
 * Best candidate at or above the cutoff; ties keep the earlier candidate.
 */
export const closestMatch = (
  query: string,
  candidates: ReadonlyArray<string>,
  cutoff: number
): string | null => {
  let best: string | null = null;
  let bestScore = cutoff;
  for (const candidate of candidates) {
    const score = similarityRatio(query, candidate);
    if (score > bestScore || (best === null && score >= bestScore)) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
};

/**
 * Collapse runs of whitespace to one space and trim
 */
export const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

/**
 * Normalize line endings, form feeds and non-breaking spaces in extracted report text.
 * Line structure is kept: several patterns anchor on line starts.
 */
export const cleanReportText = (text: string): string =>
  text
    .replace(/\r\n?/g, "\n")
    .replace(/\f/g, "\n")
    .replace(/\u00a0/g, " ")
    .replace(/[ \t]+$/gm, "");
