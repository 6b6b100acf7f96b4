/**
 * identsuggest - fuzzy identifier similarity and "Did you mean" suggestion ranking
 *
 * @packageDocumentation
 */

// ============================================================================
// NORMALIZATION & TOKENIZATION
// ============================================================================

export { normalizeIdentifier, splitIdentifier } from './identifier.js';

// ============================================================================
// JARO-WINKLER STRING SIMILARITY
// ============================================================================

export {
  JARO_WINKLER_CONFIG,
  jaroSimilarity,
  jaroWinklerSimilarity,
  commonPrefixLength,
} from './jaro-winkler.js';

// ============================================================================
// COMPOSITE SCORE
// ============================================================================

export {
  SCORE_WEIGHTS,
  type ScoreBreakdown,
  compositeScore,
  getScoreBreakdown,
} from './composite-score.js';

// ============================================================================
// RANKER
// ============================================================================

export {
  DEFAULT_RANK_LIMIT,
  type RankOptions,
  type CandidateEntry,
  type RankedCandidate,
  type RankedName,
  rankKeyed,
  rankFlat,
} from './ranker.js';

// ============================================================================
// SIGNATURES
// ============================================================================

export {
  type ParameterDescriptor,
  type MethodDescriptor,
  type TypedSymbolDescriptor,
  type TypeDescriptor,
  type NamespaceDescriptor,
  type SymbolDescriptor,
  type SymbolKind,
  SYMBOL_KINDS,
  descriptorName,
  getEntityKind,
  formatSignature,
} from './signature-formatter.js';

// ============================================================================
// SUGGESTIONS
// ============================================================================

export {
  DEFAULT_CONFIG,
  type SuggestionCategory,
  SUGGESTION_CATEGORIES,
  type DiagnosticDescriptor,
  DIAGNOSTICS,
  isSuggestionCategory,
  type SymbolContext,
  CONTEXT_BONUS,
  COMMON_TYPE_NAMES,
  COMMON_TYPE_BONUS,
  type PrioritizedCandidate,
  prioritizeSuggestions,
  applyThreshold,
  formatDiagnosticMessage,
  formatSuggestionList,
  type SuggestOptions,
  type Suggestion,
  type SuggestionReport,
  suggest,
} from './suggestions.js';

export { CandidatePoolCache } from './candidate-pool-cache.js';

// ============================================================================
// CANDIDATE FILES
// ============================================================================

export {
  type CandidateFileType,
  type CandidateFileResult,
  getCandidateFileType,
  toSymbolDescriptor,
  parseCandidateText,
  parseCandidateJSON,
  parseCandidateFile,
  parseCandidateFiles,
  mergeCandidateResults,
} from './candidates.js';
