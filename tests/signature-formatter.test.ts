import { describe, it, expect } from 'vitest';
import {
  descriptorName,
  formatSignature,
  getEntityKind,
  type SymbolDescriptor,
} from '../src/signature-formatter.js';

describe('formatSignature', () => {
  it('formats methods with parameters and return type', () => {
    expect(formatSignature({
      kind: 'method',
      name: 'Substring',
      parameters: [{ name: 'startIndex', type: 'int' }, { name: 'length', type: 'int' }],
      returnType: 'string',
    })).toBe('Substring(startIndex: int, length: int): string');
  });

  it('omits a void return type', () => {
    expect(formatSignature({ kind: 'method', name: 'Clear', parameters: [], returnType: 'void' })).toBe('Clear()');
  });

  it('includes type parameters', () => {
    expect(formatSignature({
      kind: 'method',
      name: 'Map',
      typeParameters: ['T', 'U'],
      parameters: [{ name: 'source', type: 'T' }, { name: 'fn', type: 'Func<T, U>' }],
      returnType: 'U',
    })).toBe('Map<T, U>(source: T, fn: Func<T, U>): U');
  });

  it('formats typed symbols as name: type', () => {
    expect(formatSignature({ kind: 'property', name: 'Length', type: 'int' })).toBe('Length: int');
    expect(formatSignature({ kind: 'field', name: '_count', type: 'long' })).toBe('_count: long');
    expect(formatSignature({ kind: 'local', name: 'message', type: 'string' })).toBe('message: string');
    expect(formatSignature({ kind: 'parameter', name: 'value', type: 'T' })).toBe('value: T');
  });

  it('formats types and namespaces by name', () => {
    expect(formatSignature({ kind: 'type', fullName: 'System.Text.StringBuilder' })).toBe('System.Text.StringBuilder');
    expect(formatSignature({ kind: 'namespace', name: 'System.Linq' })).toBe('System.Linq');
  });
});

describe('descriptorName', () => {
  it('uses the last segment of a type name', () => {
    expect(descriptorName({ kind: 'type', fullName: 'System.Text.StringBuilder' })).toBe('StringBuilder');
    expect(descriptorName({ kind: 'type', fullName: 'Widget' })).toBe('Widget');
  });

  it('uses the declared name otherwise', () => {
    expect(descriptorName({ kind: 'namespace', name: 'System.Linq' })).toBe('System.Linq');
    expect(descriptorName({ kind: 'method', name: 'Run', parameters: [], returnType: 'void' })).toBe('Run');
  });
});

describe('getEntityKind', () => {
  it('names every kind', () => {
    const cases: Array<[SymbolDescriptor, string]> = [
      [{ kind: 'method', name: 'm', parameters: [], returnType: 'void' }, 'Method'],
      [{ kind: 'property', name: 'p', type: 'int' }, 'Property'],
      [{ kind: 'field', name: 'f', type: 'int' }, 'Field'],
      [{ kind: 'local', name: 'l', type: 'int' }, 'Local'],
      [{ kind: 'parameter', name: 'a', type: 'int' }, 'Parameter'],
      [{ kind: 'type', fullName: 'A.B' }, 'Class'],
      [{ kind: 'namespace', name: 'A' }, 'Namespace'],
    ];
    for (const [descriptor, kind] of cases) {
      expect(getEntityKind(descriptor)).toBe(kind);
    }
  });
});
