/**
 * identsuggest command-line program
 *
 * Identifier similarity and "Did you mean" suggestions from the terminal.
 *
 * Commands:
 *   tokens  - Show the normalized form and tokens of identifiers
 *   compare - Score one candidate against an unknown name, component by component
 *   suggest - Rank candidates for an unknown name
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import * as path from 'path';
import ora from 'ora';

import { normalizeIdentifier, splitIdentifier } from './identifier.js';
import { jaroSimilarity } from './jaro-winkler.js';
import { getScoreBreakdown } from './composite-score.js';
import { parseCandidateFiles, mergeCandidateResults } from './candidates.js';
import {
  suggest,
  DEFAULT_CONFIG,
  SUGGESTION_CATEGORIES,
  type SuggestionCategory,
  type SuggestionReport,
} from './suggestions.js';
import type { SymbolDescriptor } from './signature-formatter.js';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '0.1.0';

// ============================================================================
// OPTION PARSING
// ============================================================================

type OutputFormat = 'text' | 'json';

const OUTPUT_FORMATS: OutputFormat[] = ['text', 'json'];

function parseScore(value: string): number {
  const score = Number(value);
  if (value.trim() === '' || !Number.isFinite(score)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return score;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return limit;
}

function formatOption(): Option {
  return new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text');
}

function formatScore(score: number): string {
  return score.toFixed(4);
}

// ============================================================================
// TOKENS COMMAND
// ============================================================================

interface TokensOptions {
  format: OutputFormat;
}

function createTokensCommand(): Command {
  return new Command('tokens')
    .description('Show the normalized form and word tokens of identifiers')
    .argument('<identifiers...>', 'Identifiers to split')
    .addOption(formatOption())
    .action((identifiers: string[], options: TokensOptions) => {
      const rows = identifiers.map(identifier => ({
        identifier,
        normalized: normalizeIdentifier(identifier),
        tokens: splitIdentifier(identifier),
      }));

      if (options.format === 'json') {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      for (const row of rows) {
        console.log(`${row.identifier}: normalized "${row.normalized}", tokens [${row.tokens.join(', ')}]`);
      }
    });
}

// ============================================================================
// COMPARE COMMAND
// ============================================================================

interface CompareOptions {
  format: OutputFormat;
}

function createCompareCommand(): Command {
  return new Command('compare')
    .description('Score a candidate against an unknown name and show every component')
    .argument('<unknown>', 'The unresolved name')
    .argument('<candidate>', 'The candidate name')
    .addOption(formatOption())
    .action((unknown: string, candidate: string, options: CompareOptions) => {
      const details = getScoreBreakdown(unknown, candidate);
      const jaro = jaroSimilarity(details.normalizedUnknown, details.normalizedCandidate);

      if (options.format === 'json') {
        console.log(JSON.stringify({ ...details, jaroSimilarity: jaro }, null, 2));
        return;
      }

      console.log('\n=== Identifiers ===\n');
      console.log(`Unknown:              "${details.unknown}"`);
      console.log(`Candidate:            "${details.candidate}"`);
      console.log(`Normalized unknown:   "${details.normalizedUnknown}"`);
      console.log(`Normalized candidate: "${details.normalizedCandidate}"`);
      console.log(`Unknown tokens:       [${details.unknownTokens.join(', ')}]`);
      console.log(`Candidate tokens:     [${details.candidateTokens.join(', ')}]`);

      console.log('\n=== Score Components ===\n');
      console.log(`Jaro:              ${formatScore(jaro)}`);
      console.log(`Jaro-Winkler base: ${formatScore(details.baseSimilarity)}`);
      console.log(`Exact bonus:       ${formatScore(details.exactBonus)}`);
      console.log(`Containment bonus: ${formatScore(details.containmentBonus)}`);
      console.log(`Token bonus:       ${formatScore(details.tokenBonus)} (${details.tokenMatches} token matches)`);
      console.log(`Length penalty:    ${formatScore(details.lengthPenalty)}`);

      console.log('\n=== Result ===\n');
      console.log(`Composite score: ${formatScore(details.total)}`);
      const verdict = details.total >= DEFAULT_CONFIG.MIN_SUGGESTION_SCORE ? 'Yes' : 'No';
      console.log(`Suggestable:     ${verdict} (threshold ${DEFAULT_CONFIG.MIN_SUGGESTION_SCORE})`);
      console.log('');
    });
}

// ============================================================================
// SUGGEST COMMAND
// ============================================================================

interface SuggestCommandOptions {
  candidatesFile?: string[];
  category?: SuggestionCategory;
  target?: string;
  targetKind?: string;
  minScore: number;
  limit: number;
  format: OutputFormat;
  quiet?: boolean;
}

function printReport(report: SuggestionReport): void {
  if (report.suggestions.length === 0) {
    console.log(`No suggestions for "${report.unknown}"`);
    return;
  }

  console.log(`Suggestions for "${report.unknown}":`);
  const width = Math.max(...report.suggestions.map(s => s.signature.length));
  report.suggestions.forEach((s, i) => {
    console.log(`  ${i + 1}. ${s.signature.padEnd(width)}  ${formatScore(s.score)}`);
  });
}

function createSuggestCommand(): Command {
  return new Command('suggest')
    .description('Rank candidate names for an unresolved identifier')
    .argument('<unknown>', 'The unresolved name')
    .argument('[candidates...]', 'Candidate names')
    .option('-c, --candidates-file <files...>', 'Candidate files (.txt one name per line, .json names or symbol descriptors)')
    .addOption(
      new Option('--category <category>', 'Diagnostic category used for the message')
        .choices(SUGGESTION_CATEGORIES)
    )
    .option('-t, --target <name>', 'Containing type (member) or invoked method (named-argument)')
    .option('--target-kind <kind>', 'Kind of the invoked target for named-argument messages')
    .option('-m, --min-score <score>', 'Minimum composite score', parseScore, DEFAULT_CONFIG.MIN_SUGGESTION_SCORE)
    .option('-l, --limit <count>', 'Maximum number of suggestions', parseLimit, DEFAULT_CONFIG.MAX_SUGGESTIONS)
    .addOption(formatOption())
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (unknown: string, candidates: string[], options: SuggestCommandOptions) => {
      const files = options.candidatesFile ?? [];
      const spinner = options.quiet || files.length === 0 ? null : ora('Loading candidates...').start();

      try {
        const pool = candidates.map((name): SymbolDescriptor => ({ kind: 'namespace', name }));

        if (files.length > 0) {
          const results = await parseCandidateFiles(files.map(f => path.resolve(f)));
          const merged = mergeCandidateResults(results);
          pool.push(...merged.candidates);

          if (merged.errorCount > 0) {
            spinner?.warn(`Loaded ${merged.successCount} files, ${merged.errorCount} failed`);
            for (const err of merged.errors) {
              console.error(`  Error in ${err.file}: ${err.error}`);
            }
          } else {
            spinner?.succeed(`Loaded ${merged.candidates.length} candidates from ${merged.successCount} files`);
          }
        }

        if (pool.length === 0) {
          throw new Error('No candidates to rank');
        }

        const report = suggest(options.category ?? 'namespace', unknown, pool, {
          target: options.target,
          targetKind: options.targetKind,
          minScore: options.minScore,
          limit: options.limit,
        });

        if (options.format === 'json') {
          console.log(JSON.stringify(report, null, 2));
          return;
        }

        printReport(report);
        if (options.category && report.message) {
          console.log(`\n${report.diagnosticId}: ${report.message}`);
        }
      } catch (error) {
        if (spinner) spinner.fail('Suggest failed');
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}

// ============================================================================
// MAIN PROGRAM
// ============================================================================

export function createProgram(): Command {
  const program = new Command()
    .name('identsuggest')
    .description('Identifier similarity scoring and "Did you mean" suggestions')
    .version(VERSION);

  program.addCommand(createTokensCommand());
  program.addCommand(createCompareCommand());
  program.addCommand(createSuggestCommand());

  return program;
}
