/**
 * Kind of source construct a parse error refers to
 */
export type ConstructKind = 'document' | 'phase' | 'group' | 'task';

/**
 * Malformed input. Parsing is atomic: no partial document accompanies it.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line: number,
    public readonly construct: ConstructKind,
    public readonly expected: string
  ) {
    super(`Line ${line}: ${message} (expected ${expected})`);
    this.name = 'ParseError';
  }
}

/**
 * Well-formed lines that break a document invariant: a task without an owning
 * phase, a repeated task identifier, an out-of-order phase number.
 */
export class StructuralError extends ParseError {
  constructor(
    message: string,
    line: number,
    construct: ConstructKind,
    expected: string
  ) {
    super(message, line, construct, expected);
    this.name = 'StructuralError';
  }
}
