/**
 * Symbol Signature Formatting
 *
 * Renders symbol descriptors into the one-line signatures shown under a
 * "Did you mean" message. Methods show their parameter lists, typed symbols
 * show their type, namespaces and types show their plain name.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface ParameterDescriptor {
  name: string;
  type: string;
}

export interface MethodDescriptor {
  kind: 'method';
  name: string;
  parameters: ParameterDescriptor[];
  returnType: string;
  typeParameters?: string[];
}

export interface TypedSymbolDescriptor {
  kind: 'property' | 'field' | 'local' | 'parameter';
  name: string;
  type: string;
}

export interface TypeDescriptor {
  kind: 'type';
  /** Fully qualified name, e.g. "System.Text.StringBuilder" */
  fullName: string;
}

export interface NamespaceDescriptor {
  kind: 'namespace';
  name: string;
}

export type SymbolDescriptor =
  | MethodDescriptor
  | TypedSymbolDescriptor
  | TypeDescriptor
  | NamespaceDescriptor;

export type SymbolKind = SymbolDescriptor['kind'];

export const SYMBOL_KINDS: readonly SymbolKind[] = [
  'method',
  'property',
  'field',
  'local',
  'parameter',
  'type',
  'namespace',
];

// ============================================================================
// NAMES
// ============================================================================

/**
 * Name used when ranking a descriptor: the last dotted segment for types,
 * the declared name otherwise.
 */
export function descriptorName(descriptor: SymbolDescriptor): string {
  if (descriptor.kind === 'type') {
    const lastDot = descriptor.fullName.lastIndexOf('.');
    return descriptor.fullName.slice(lastDot + 1);
  }
  return descriptor.name;
}

/**
 * Human-readable kind, used as the leading word of variable diagnostics
 * ("Local 'messag' does not exist")
 */
export function getEntityKind(descriptor: SymbolDescriptor): string {
  switch (descriptor.kind) {
    case 'method':
      return 'Method';
    case 'property':
      return 'Property';
    case 'field':
      return 'Field';
    case 'local':
      return 'Local';
    case 'parameter':
      return 'Parameter';
    case 'type':
      return 'Class';
    case 'namespace':
      return 'Namespace';
  }
}

// ============================================================================
// SIGNATURES
// ============================================================================

function formatMethod(method: MethodDescriptor): string {
  const typeParams = method.typeParameters && method.typeParameters.length > 0
    ? `<${method.typeParameters.join(', ')}>`
    : '';
  const params = method.parameters.map(p => `${p.name}: ${p.type}`).join(', ');

  let signature = `${method.name}${typeParams}(${params})`;
  if (method.returnType !== 'void') {
    signature += `: ${method.returnType}`;
  }
  return signature;
}

/**
 * @example
 * formatSignature({ kind: 'method', name: 'add', parameters: [{ name: 'item', type: 'T' }], returnType: 'void' })
 * // 'add(item: T)'
 * formatSignature({ kind: 'property', name: 'length', type: 'int' })
 * // 'length: int'
 */
export function formatSignature(descriptor: SymbolDescriptor): string {
  switch (descriptor.kind) {
    case 'method':
      return formatMethod(descriptor);
    case 'property':
    case 'field':
    case 'local':
    case 'parameter':
      return `${descriptor.name}: ${descriptor.type}`;
    case 'type':
      return descriptor.fullName;
    case 'namespace':
      return descriptor.name;
  }
}
