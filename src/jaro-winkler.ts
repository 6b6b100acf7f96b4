/**
 * Jaro-Winkler String Similarity
 *
 * Character-level similarity between two identifiers, in [0, 1].
 *
 * Algorithm:
 * 1. Jaro similarity counts characters matching within a sliding window and
 *    penalizes matched characters that appear out of order (transpositions)
 * 2. Winkler modification boosts the score for strings sharing a prefix
 *
 * Inputs are compared exactly as given. Callers that want case-insensitive
 * comparison normalize first (see `normalizeIdentifier`).
 */

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const JARO_WINKLER_CONFIG = {
  /** Weight of each shared prefix character */
  PREFIX_SCALING_FACTOR: 0.1,
  /** Longest prefix that earns the boost */
  MAX_PREFIX_LENGTH: 4,
};

// =============================================================================
// CORE JARO FUNCTIONS
// =============================================================================

/**
 * Calculate Jaro similarity between two strings
 * Returns a value between 0 (no match) and 1 (exact match)
 *
 * Two empty strings are identical (1.0); one empty string matches nothing (0.0).
 * Symmetric in its arguments.
 */
export function jaroSimilarity(
  s1: string | null | undefined,
  s2: string | null | undefined
): number {
  const str1 = s1 ?? '';
  const str2 = s2 ?? '';

  if (str1 === str2) return 1.0;
  if (str1.length === 0 || str2.length === 0) return 0.0;

  const matchWindow = Math.max(0, Math.floor(Math.max(str1.length, str2.length) / 2) - 1);

  const s1Matches: boolean[] = new Array<boolean>(str1.length).fill(false);
  const s2Matches: boolean[] = new Array<boolean>(str2.length).fill(false);

  let matches = 0;
  let transpositions = 0;

  for (let i = 0; i < str1.length; i++) {
    const start = Math.max(0, i - matchWindow);
    const end = Math.min(i + matchWindow + 1, str2.length);

    for (let j = start; j < end; j++) {
      if (s2Matches[j] || str1[i] !== str2[j]) continue;
      s1Matches[i] = true;
      s2Matches[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) return 0.0;

  let k = 0;
  for (let i = 0; i < str1.length; i++) {
    if (!s1Matches[i]) continue;
    while (!s2Matches[k]) k++;
    if (str1[i] !== str2[k]) transpositions++;
    k++;
  }

  // Half the mismatched positions, rounded down
  const halfTranspositions = Math.floor(transpositions / 2);

  return (
    matches / str1.length +
    matches / str2.length +
    (matches - halfTranspositions) / matches
  ) / 3;
}

/**
 * Calculate common prefix length, capped at `maxPrefix` characters
 */
export function commonPrefixLength(
  s1: string,
  s2: string,
  maxPrefix: number = JARO_WINKLER_CONFIG.MAX_PREFIX_LENGTH
): number {
  let prefix = 0;

  for (let i = 0; i < Math.min(s1.length, s2.length, maxPrefix); i++) {
    if (s1[i] === s2[i]) {
      prefix++;
    } else {
      break;
    }
  }

  return prefix;
}

/**
 * Calculate Jaro-Winkler similarity between two strings
 *
 * Never lower than `jaroSimilarity(s1, s2)`; equal to it when the strings
 * share no prefix.
 *
 * @returns Similarity score between 0 and 1
 *
 * @example
 * jaroWinklerSimilarity('martha', 'marhta')  // ≈ 0.9611
 */
export function jaroWinklerSimilarity(
  s1: string | null | undefined,
  s2: string | null | undefined
): number {
  const str1 = s1 ?? '';
  const str2 = s2 ?? '';

  const p = JARO_WINKLER_CONFIG.PREFIX_SCALING_FACTOR;
  const jaro = jaroSimilarity(str1, str2);
  const prefix = commonPrefixLength(str1, str2);

  return jaro + (prefix * p * (1 - jaro));
}
