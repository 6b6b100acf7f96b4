/**
 * Candidate Ranker
 *
 * Picks the best "Did you mean" candidates for an unknown name.
 *
 * Two entry shapes share one pipeline (filter → score → sort → take):
 * - keyed: `[name, payload]` pairs, payload passed through untouched
 * - flat: plain names
 *
 * The ranker applies no score cutoff. It always returns up to `limit`
 * candidates, best first; callers apply their own thresholds on the scores.
 */

import { compositeScore } from './composite-score.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export const DEFAULT_RANK_LIMIT = 5;

export interface RankOptions {
  /** Maximum number of results (default 5) */
  limit?: number;
}

// ============================================================================
// TYPES
// ============================================================================

/** A candidate name carrying an opaque payload */
export type CandidateEntry<T> = readonly [name: string | null | undefined, value: T];

export interface RankedCandidate<T> {
  name: string;
  value: T;
  score: number;
}

export interface RankedName {
  name: string;
  score: number;
}

// ============================================================================
// RANKING
// ============================================================================

function takeTop<R extends { score: number }>(scored: R[], limit: number): R[] {
  // Array.prototype.sort is stable: equal scores keep input order
  return scored
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, limit));
}

/**
 * Rank `[name, payload]` candidates against an unknown name.
 *
 * Entries with an empty name are skipped, as is any entry whose name equals
 * `unknown` exactly: the literal name is never its own suggestion.
 *
 * @example
 * rankKeyed('frstName', new Map([['firstName', field], ['lastName', other]]))
 * // [{ name: 'firstName', value: field, score: ... }, ...]
 */
export function rankKeyed<T>(
  unknown: string | null | undefined,
  candidates: Iterable<CandidateEntry<T>> | null | undefined,
  options: RankOptions = {}
): RankedCandidate<T>[] {
  if (!unknown || !candidates) {
    return [];
  }

  const { limit = DEFAULT_RANK_LIMIT } = options;
  const scored: RankedCandidate<T>[] = [];

  for (const [name, value] of candidates) {
    if (!name || name === unknown) continue;
    scored.push({ name, value, score: compositeScore(unknown, name) });
  }

  return takeTop(scored, limit);
}

/**
 * Rank plain candidate names against an unknown name.
 * Null and empty entries are skipped.
 */
export function rankFlat(
  unknown: string | null | undefined,
  candidates: Iterable<string | null | undefined> | null | undefined,
  options: RankOptions = {}
): RankedName[] {
  if (!unknown || !candidates) {
    return [];
  }

  const { limit = DEFAULT_RANK_LIMIT } = options;
  const scored: RankedName[] = [];

  for (const name of candidates) {
    if (!name) continue;
    scored.push({ name, score: compositeScore(unknown, name) });
  }

  return takeTop(scored, limit);
}
