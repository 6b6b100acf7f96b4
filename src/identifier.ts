/**
 * Identifier Normalization and Tokenization
 *
 * Two views of an identifier used by the scorer:
 * - the normalized form, for character-level comparison ("Hello_World" → "helloworld")
 * - the token sequence, for word-level comparison ("getUserName" → get, user, name)
 *
 * Neither function throws; absent input is treated as the empty string.
 */

// ============================================================================
// PATTERNS
// ============================================================================

/**
 * Split points: before every uppercase letter (zero-width), and on every
 * underscore, whitespace or digit (consumed).
 */
const SPLIT_PATTERN = /(?=[A-Z])|[_\s\d]/;

/** Characters dropped by normalization. Other punctuation is kept. */
const SEPARATOR_PATTERN = /[_\s]/g;

// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * Lowercase an identifier and strip underscores and whitespace.
 *
 * Idempotent: `normalizeIdentifier(normalizeIdentifier(x)) === normalizeIdentifier(x)`.
 *
 * @example
 * normalizeIdentifier('Hello_World')  // 'helloworld'
 * normalizeIdentifier('hello world')  // 'helloworld'
 * normalizeIdentifier(null)           // ''
 */
export function normalizeIdentifier(text: string | null | undefined): string {
  if (!text) return '';
  return text.toLowerCase().replace(SEPARATOR_PATTERN, '');
}

// ============================================================================
// TOKENIZATION
// ============================================================================

/**
 * Split an identifier into lowercase word tokens.
 *
 * Every capital starts a new token, so acronyms break into one-letter tokens
 * ("XMLHttpRequest" → x, m, l, http, request). Digits only separate and never
 * survive as tokens.
 *
 * @example
 * splitIdentifier('camelCase')       // ['camel', 'case']
 * splitIdentifier('snake_case')      // ['snake', 'case']
 * splitIdentifier('get123Users456')  // ['get', 'users']
 * splitIdentifier('123')             // []
 */
export function splitIdentifier(text: string | null | undefined): string[] {
  if (!text) return [];

  return text
    .split(SPLIT_PATTERN)
    .map(fragment => fragment.toLowerCase())
    .filter(fragment => fragment.length > 0);
}
