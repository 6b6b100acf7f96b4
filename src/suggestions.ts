/**
 * "Did you mean" Suggestions
 *
 * The calling layer over the ranker: one entry point shared by the five
 * diagnostic categories. Ranks a pool of symbol descriptors, applies the
 * relevance threshold, optionally reorders by where each symbol comes from,
 * and renders the diagnostic message.
 */

import { rankKeyed, DEFAULT_RANK_LIMIT, type CandidateEntry, type RankedCandidate } from './ranker.js';
import {
  descriptorName,
  formatSignature,
  getEntityKind,
  type SymbolDescriptor,
} from './signature-formatter.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export const DEFAULT_CONFIG = {
  /** Candidates scoring below this are not worth suggesting */
  MIN_SUGGESTION_SCORE: 0.3,
  MAX_SUGGESTIONS: DEFAULT_RANK_LIMIT,
};

export type SuggestionCategory = 'member' | 'variable' | 'namespace' | 'named-argument' | 'nameof';

export const SUGGESTION_CATEGORIES: readonly SuggestionCategory[] = [
  'member',
  'variable',
  'namespace',
  'named-argument',
  'nameof',
];

export interface DiagnosticDescriptor {
  id: string;
  title: string;
  /** Positional placeholders: {0}, {1}, ... */
  messageFormat: string;
  description: string;
}

export const DIAGNOSTICS: Record<SuggestionCategory, DiagnosticDescriptor> = {
  member: {
    id: 'SUG001',
    title: 'Member not found',
    messageFormat: "Member '{0}' does not exist on type '{1}'. Did you mean:{2}",
    description: 'This member does not exist on the given type.',
  },
  variable: {
    id: 'SUG002',
    title: 'Variable not found',
    messageFormat: "{0} '{1}' does not exist in the current scope. Did you mean:{2}",
    description: 'This variable does not exist in the current scope.',
  },
  namespace: {
    id: 'SUG003',
    title: 'Namespace not found',
    messageFormat: "Namespace '{0}' does not exist. Did you mean:{1}",
    description: 'This namespace does not exist.',
  },
  'named-argument': {
    id: 'SUG004',
    title: 'Named argument not found',
    messageFormat: "Parameter '{0}' does not exist for {1} '{2}'. Available signatures:{3}",
    description: 'This named argument does not exist for the method or constructor.',
  },
  nameof: {
    id: 'SUG005',
    title: 'Invalid nameof argument',
    messageFormat: "Argument '{0}' in nameof() does not exist. Did you mean:{1}",
    description: 'The argument used in the nameof() operator does not exist in the current scope.',
  },
};

export function isSuggestionCategory(value: string): value is SuggestionCategory {
  return (SUGGESTION_CATEGORIES as readonly string[]).includes(value);
}

// ============================================================================
// SYMBOL CONTEXT PRIORITY
// ============================================================================

/** Where a candidate symbol is declared, nearest first */
export type SymbolContext = 'local-scope' | 'current-class' | 'current-project' | 'external-library';

export const CONTEXT_BONUS: Record<SymbolContext, number> = {
  'local-scope': 0.3,
  'current-class': 0.2,
  'current-project': 0.1,
  'external-library': 0,
};

/** Well-known library types that win close calls once similarity is high */
export const COMMON_TYPE_NAMES: ReadonlySet<string> = new Set([
  'Dictionary',
  'List',
  'Array',
  'String',
  'StringBuilder',
  'HashSet',
  'Queue',
  'Stack',
  'ConcurrentDictionary',
  'IEnumerable',
  'ICollection',
  'IList',
  'IDictionary',
  'Task',
  'DateTime',
  'TimeSpan',
  'Guid',
]);

export const COMMON_TYPE_BONUS = {
  BONUS: 0.25,
  /** Similarity a common type needs before the bonus applies */
  MIN_SIMILARITY: 0.8,
};

export interface PrioritizedCandidate<T> extends RankedCandidate<T> {
  context: SymbolContext;
  /** Similarity score plus the context and common-type bonuses */
  finalScore: number;
}

function commonTypeBonus(name: string, score: number): number {
  if (score < COMMON_TYPE_BONUS.MIN_SIMILARITY) return 0;
  const simpleName = name.slice(name.lastIndexOf('.') + 1);
  return COMMON_TYPE_NAMES.has(simpleName) ? COMMON_TYPE_BONUS.BONUS : 0;
}

/**
 * Reorder ranked candidates so nearer declarations win close calls.
 * Equal final scores fall back to similarity, then to ranked order.
 */
export function prioritizeSuggestions<T>(
  ranked: RankedCandidate<T>[],
  contextOf: (value: T) => SymbolContext
): PrioritizedCandidate<T>[] {
  return ranked
    .map(candidate => {
      const context = contextOf(candidate.value);
      const finalScore = candidate.score
        + CONTEXT_BONUS[context]
        + commonTypeBonus(candidate.name, candidate.score);
      return { ...candidate, context, finalScore };
    })
    .sort((a, b) => b.finalScore - a.finalScore || b.score - a.score);
}

// ============================================================================
// THRESHOLD & MESSAGES
// ============================================================================

/** Keep candidates scoring at least `minScore` */
export function applyThreshold<R extends { score: number }>(ranked: R[], minScore: number): R[] {
  return ranked.filter(candidate => candidate.score >= minScore);
}

/**
 * Substitute positional placeholders. Placeholders without an argument are left as-is.
 *
 * @example
 * formatDiagnosticMessage("Namespace '{0}' does not exist", ['Systm'])
 * // "Namespace 'Systm' does not exist"
 */
export function formatDiagnosticMessage(template: string, args: readonly string[]): string {
  return template.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
    const arg = args[Number(index)];
    return arg === undefined ? placeholder : arg;
  });
}

/** Bulleted list, one suggestion per line */
export function formatSuggestionList(lines: readonly string[]): string {
  return '\n- ' + lines.join('\n- ');
}

// ============================================================================
// SUGGEST
// ============================================================================

export interface SuggestOptions {
  /** Containing type (member) or invoked method (named-argument) */
  target?: string;
  /** Kind of the invoked target for named-argument messages, e.g. "constructor" */
  targetKind?: string;
  minScore?: number;
  limit?: number;
  /** When given, candidates are reordered by declaration context */
  contextOf?: (descriptor: SymbolDescriptor) => SymbolContext;
}

export interface Suggestion {
  name: string;
  descriptor: SymbolDescriptor;
  score: number;
  /** Score after context priority; equal to `score` without `contextOf` */
  finalScore: number;
  signature: string;
}

export interface SuggestionReport {
  diagnosticId: string;
  category: SuggestionCategory;
  unknown: string;
  suggestions: Suggestion[];
  /** Null when no candidate passes the threshold */
  message: string | null;
  /** Suggested names joined by "|", for consumers applying a fix */
  properties: { Suggestions: string };
}

function buildMessageArgs(
  category: SuggestionCategory,
  unknown: string,
  suggestions: Suggestion[],
  options: SuggestOptions
): string[] {
  const list = formatSuggestionList(suggestions.map(s => s.signature));

  switch (category) {
    case 'member':
      return [unknown, options.target ?? '?', list];
    case 'variable':
      // The best suggestion names the kind of entity the user probably meant
      return [getEntityKind(suggestions[0].descriptor), unknown, list];
    case 'namespace':
    case 'nameof':
      return [unknown, list];
    case 'named-argument':
      return [unknown, options.targetKind ?? 'method', options.target ?? '?', list];
  }
}

/**
 * Build the "Did you mean" report for one unresolved identifier.
 *
 * @example
 * suggest('member', 'Lenght', [{ kind: 'property', name: 'Length', type: 'int' }], { target: 'string' })
 * // message: "Member 'Lenght' does not exist on type 'string'. Did you mean:\n- Length: int"
 */
export function suggest(
  category: SuggestionCategory,
  unknown: string | null | undefined,
  pool: Iterable<SymbolDescriptor> | null | undefined,
  options: SuggestOptions = {}
): SuggestionReport {
  const {
    minScore = DEFAULT_CONFIG.MIN_SUGGESTION_SCORE,
    limit = DEFAULT_CONFIG.MAX_SUGGESTIONS,
    contextOf,
  } = options;
  const name = unknown ?? '';

  const entries: CandidateEntry<SymbolDescriptor>[] = [];
  for (const descriptor of pool ?? []) {
    entries.push([descriptorName(descriptor), descriptor]);
  }

  // Context priority may promote a candidate from below the cut, so rank everything first
  const ranked = applyThreshold(
    rankKeyed(name, entries, { limit: contextOf ? Number.POSITIVE_INFINITY : limit }),
    minScore
  );

  const ordered: Array<RankedCandidate<SymbolDescriptor> & { finalScore: number }> = contextOf
    ? prioritizeSuggestions(ranked, contextOf).slice(0, limit)
    : ranked.map(candidate => ({ ...candidate, finalScore: candidate.score }));

  const suggestions: Suggestion[] = ordered.map(candidate => ({
    name: candidate.name,
    descriptor: candidate.value,
    score: candidate.score,
    finalScore: candidate.finalScore,
    signature: formatSignature(candidate.value),
  }));

  const diagnostic = DIAGNOSTICS[category];
  const message = suggestions.length > 0
    ? formatDiagnosticMessage(
        diagnostic.messageFormat,
        buildMessageArgs(category, name, suggestions, options)
      )
    : null;

  return {
    diagnosticId: diagnostic.id,
    category,
    unknown: name,
    suggestions,
    message,
    properties: { Suggestions: suggestions.map(s => s.name).join('|') },
  };
}
