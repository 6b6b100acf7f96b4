/**
 * Candidate File Loader
 *
 * Reads candidate pools for the CLI.
 *
 * Supported formats:
 * - .txt, .lst  one name per line; blank lines and lines starting with # are skipped
 * - .json an array of names and/or symbol descriptors
 *
 * Loading never rejects: failures come back as `success: false` results.
 */

import * as fsPromises from 'fs/promises';
import * as path from 'path';

import {
  SYMBOL_KINDS,
  type ParameterDescriptor,
  type SymbolDescriptor,
  type SymbolKind,
} from './signature-formatter.js';

// ============================================================================
// TYPES
// ============================================================================

export type CandidateFileType = 'txt' | 'json' | 'unknown';

export interface CandidateFileResult {
  success: boolean;
  candidates: SymbolDescriptor[];
  fileType: CandidateFileType;
  fileName: string;
  error?: string;
}

// ============================================================================
// FILE TYPE DETECTION
// ============================================================================

export function getCandidateFileType(filePath: string): CandidateFileType {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.txt':
    case '.lst':
      return 'txt';
    case '.json':
      return 'json';
    default:
      return 'unknown';
  }
}

// ============================================================================
// DESCRIPTOR VALIDATION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new Error(`${where}: "${key}" must be a string`);
  }
  return value;
}

function toParameters(value: unknown, where: string): ParameterDescriptor[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`${where}: "parameters" must be an array`);
  }
  return value.map((param, i) => {
    if (!isRecord(param)) {
      throw new Error(`${where}: parameter ${i} must be an object`);
    }
    return {
      name: requireString(param, 'name', `${where} parameter ${i}`),
      type: requireString(param, 'type', `${where} parameter ${i}`),
    };
  });
}

function toStringArray(value: unknown, where: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new Error(`${where}: "typeParameters" must be an array of strings`);
  }
  return value.map(item => {
    if (typeof item !== 'string') {
      throw new Error(`${where}: "typeParameters" must be an array of strings`);
    }
    return item;
  });
}

function isSymbolKind(value: unknown): value is SymbolKind {
  return typeof value === 'string' && (SYMBOL_KINDS as readonly string[]).includes(value);
}

/**
 * Convert one JSON entry to a descriptor.
 * A bare string becomes a namespace-kind descriptor, which formats as the plain name.
 */
export function toSymbolDescriptor(entry: unknown, index: number): SymbolDescriptor {
  const where = `Entry ${index}`;

  if (typeof entry === 'string') {
    return { kind: 'namespace', name: entry };
  }
  if (!isRecord(entry)) {
    throw new Error(`${where}: expected a string or an object`);
  }

  const kind = entry.kind;
  if (!isSymbolKind(kind)) {
    throw new Error(`${where}: "kind" must be one of ${SYMBOL_KINDS.join(', ')}`);
  }

  switch (kind) {
    case 'method': {
      const typeParameters = toStringArray(entry.typeParameters, where);
      return {
        kind,
        name: requireString(entry, 'name', where),
        parameters: toParameters(entry.parameters, where),
        returnType: typeof entry.returnType === 'string' ? entry.returnType : 'void',
        ...(typeParameters ? { typeParameters } : {}),
      };
    }
    case 'property':
    case 'field':
    case 'local':
    case 'parameter':
      return {
        kind,
        name: requireString(entry, 'name', where),
        type: requireString(entry, 'type', where),
      };
    case 'type':
      return { kind, fullName: requireString(entry, 'fullName', where) };
    case 'namespace':
      return { kind, name: requireString(entry, 'name', where) };
  }
}

// ============================================================================
// PARSERS
// ============================================================================

export function parseCandidateText(content: string): SymbolDescriptor[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
    .map((name): SymbolDescriptor => ({ kind: 'namespace', name }));
}

export function parseCandidateJSON(content: string): SymbolDescriptor[] {
  const data: unknown = JSON.parse(content);
  if (!Array.isArray(data)) {
    throw new Error('Candidate JSON must be an array');
  }
  return data.map((entry, i) => toSymbolDescriptor(entry, i));
}

// ============================================================================
// MAIN LOAD FUNCTION
// ============================================================================

/**
 * Load a candidate file
 */
export async function parseCandidateFile(filePath: string): Promise<CandidateFileResult> {
  const fileType = getCandidateFileType(filePath);
  const fileName = path.basename(filePath);

  if (fileType === 'unknown') {
    return {
      success: false,
      candidates: [],
      fileType,
      fileName,
      error: `Unsupported file type: ${path.extname(filePath) || '(none)'}`,
    };
  }

  try {
    const content = await fsPromises.readFile(filePath, 'utf-8');
    const candidates = fileType === 'json'
      ? parseCandidateJSON(content)
      : parseCandidateText(content);

    return { success: true, candidates, fileType, fileName };
  } catch (error) {
    return {
      success: false,
      candidates: [],
      fileType,
      fileName,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Load several candidate files
 */
export async function parseCandidateFiles(filePaths: string[]): Promise<CandidateFileResult[]> {
  return Promise.all(filePaths.map(parseCandidateFile));
}

/**
 * Merge the candidates of every successful result
 */
export function mergeCandidateResults(results: CandidateFileResult[]): {
  candidates: SymbolDescriptor[];
  successCount: number;
  errorCount: number;
  errors: Array<{ file: string; error: string }>;
} {
  const candidates: SymbolDescriptor[] = [];
  let successCount = 0;
  let errorCount = 0;
  const errors: Array<{ file: string; error: string }> = [];

  for (const result of results) {
    if (result.success) {
      candidates.push(...result.candidates);
      successCount++;
    } else {
      errorCount++;
      errors.push({ file: result.fileName, error: result.error || 'Unknown error' });
    }
  }

  return { candidates, successCount, errorCount, errors };
}
