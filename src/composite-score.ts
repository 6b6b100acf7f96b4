/**
 * Composite Relevance Score
 *
 * Ranks a candidate identifier against an unknown one. Combines:
 * - Jaro-Winkler similarity of the normalized forms (base, 0-1)
 * - Exact match bonus when the normalized forms are equal
 * - Containment bonus when one normalized form contains the other
 * - Token bonus for shared or prefix-related word tokens
 * - Length penalty for candidates longer than the unknown name
 *
 * The result is a ranking metric, not a probability: bonuses push good
 * matches above 1.0 and the score is never clamped.
 */

import { normalizeIdentifier, splitIdentifier } from './identifier.js';
import { jaroWinklerSimilarity } from './jaro-winkler.js';

// ============================================================================
// WEIGHTS
// ============================================================================

export const SCORE_WEIGHTS = {
  EXACT_MATCH_BONUS: 0.3,
  CONTAINMENT_BONUS: 0.2,
  TOKEN_EXACT_BONUS: 0.2,
  TOKEN_PREFIX_BONUS: 0.1,
  /** Added once when at least MULTI_TOKEN_MIN_MATCHES token pairs matched */
  MULTI_TOKEN_BONUS: 0.2,
  MULTI_TOKEN_MIN_MATCHES: 2,
  /** Subtracted per character the candidate is longer than the unknown name */
  LENGTH_PENALTY_PER_CHAR: 0.01,
};

// ============================================================================
// TYPES
// ============================================================================

export interface ScoreBreakdown {
  unknown: string;
  candidate: string;
  normalizedUnknown: string;
  normalizedCandidate: string;
  unknownTokens: string[];
  candidateTokens: string[];
  baseSimilarity: number;
  exactBonus: number;
  containmentBonus: number;
  tokenBonus: number;
  /** Token pairs that counted towards the bonus (exact or prefix) */
  tokenMatches: number;
  lengthPenalty: number;
  total: number;
}

// ============================================================================
// TOKEN BONUS
// ============================================================================

/**
 * Score word-level overlap between two token sets.
 * Every pair is compared, so one token can match several on the other side.
 */
function calculateTokenBonus(
  unknownTokens: ReadonlySet<string>,
  candidateTokens: ReadonlySet<string>
): { bonus: number; matches: number } {
  let bonus = 0;
  let matches = 0;

  for (const tq of unknownTokens) {
    for (const tc of candidateTokens) {
      if (tq === tc) {
        bonus += SCORE_WEIGHTS.TOKEN_EXACT_BONUS;
        matches++;
      } else if (tq.startsWith(tc) || tc.startsWith(tq)) {
        bonus += SCORE_WEIGHTS.TOKEN_PREFIX_BONUS;
        matches++;
      }
    }
  }

  if (matches >= SCORE_WEIGHTS.MULTI_TOKEN_MIN_MATCHES) {
    bonus += SCORE_WEIGHTS.MULTI_TOKEN_BONUS;
  }

  return { bonus, matches };
}

// ============================================================================
// SCORING
// ============================================================================

/**
 * Compute every component of the composite score.
 * Used by `compositeScore` and by the CLI `compare` command.
 */
export function getScoreBreakdown(
  unknown: string | null | undefined,
  candidate: string | null | undefined
): ScoreBreakdown {
  const rawUnknown = unknown ?? '';
  const rawCandidate = candidate ?? '';

  const normalizedUnknown = normalizeIdentifier(rawUnknown);
  const normalizedCandidate = normalizeIdentifier(rawCandidate);

  const baseSimilarity = jaroWinklerSimilarity(normalizedUnknown, normalizedCandidate);

  const exactBonus = normalizedUnknown === normalizedCandidate
    ? SCORE_WEIGHTS.EXACT_MATCH_BONUS
    : 0;

  const contains = normalizedCandidate.includes(normalizedUnknown)
    || normalizedUnknown.includes(normalizedCandidate);
  const containmentBonus = contains ? SCORE_WEIGHTS.CONTAINMENT_BONUS : 0;

  // Tokens come from the raw strings: normalization would erase the casing boundaries
  const unknownTokens = new Set(splitIdentifier(rawUnknown));
  const candidateTokens = new Set(splitIdentifier(rawCandidate));
  const token = calculateTokenBonus(unknownTokens, candidateTokens);

  const lengthPenalty = Math.max(0, rawCandidate.length - rawUnknown.length)
    * SCORE_WEIGHTS.LENGTH_PENALTY_PER_CHAR;

  const total = baseSimilarity + exactBonus + containmentBonus + token.bonus - lengthPenalty;

  return {
    unknown: rawUnknown,
    candidate: rawCandidate,
    normalizedUnknown,
    normalizedCandidate,
    unknownTokens: [...unknownTokens],
    candidateTokens: [...candidateTokens],
    baseSimilarity,
    exactBonus,
    containmentBonus,
    tokenBonus: token.bonus,
    tokenMatches: token.matches,
    lengthPenalty,
    total,
  };
}

/**
 * Composite relevance of `candidate` as a replacement for `unknown`.
 *
 * @example
 * compositeScore('', '')                    // 1.5 (base 1.0 + exact 0.3 + containment 0.2)
 * compositeScore('firstName', 'firstName')  // > 1.0
 */
export function compositeScore(
  unknown: string | null | undefined,
  candidate: string | null | undefined
): number {
  return getScoreBreakdown(unknown, candidate).total;
}
