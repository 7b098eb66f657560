/**
 * Syntax tree model consumed by the comment analyzer.
 *
 * Trees are produced by a tree provider (see typescript-tree.ts) and are never
 * mutated by the analyzer. Lines and columns are zero-based.
 */

export interface Position {
  readonly line: number;
  readonly column: number;
}

// Half-open: `end` points just past the last character
export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export enum TriviaKind {
  Whitespace = 'whitespace',
  EndOfLine = 'end-of-line',
  LineComment = 'line-comment',
  Other = 'other',
}

export interface Trivia {
  readonly kind: TriviaKind;
  readonly span: Span;
  readonly text: string;
}

export enum NodeKind {
  SourceFile = 'source-file',
  Block = 'block',
  Return = 'return',
  Throw = 'throw',
  SimpleAssignment = 'simple-assignment',
  AddAssignment = 'add-assignment',
  SubtractAssignment = 'subtract-assignment',
  Invocation = 'invocation',
  Expression = 'expression',
  Declaration = 'declaration',
  If = 'if',
  Loop = 'loop',
  Switch = 'switch',
  Try = 'try',
  Other = 'other',
}

export interface SyntaxNode {
  readonly kind: NodeKind;
  readonly span: Span;
  readonly leadingTrivia: readonly Trivia[];
  readonly trailingTrivia: readonly Trivia[];
  /**
   * For blocks and the source file: the direct child statements, in order.
   * For any other node: the nearest blocks nested inside it (function bodies,
   * branches, callbacks), so that a pre-order walk reaches every block.
   */
  readonly children: readonly SyntaxNode[];
}

export interface SyntaxTree {
  readonly filePath: string;
  readonly root: SyntaxNode;
  /** Every comment in the file, in document order. */
  commentTrivia(): readonly Trivia[];
  /** Source text of a line without its terminator; `''` when out of range. */
  lineText(line: number): string;
}

export function comparePositions(a: Position, b: Position): number {
  return a.line !== b.line ? a.line - b.line : a.column - b.column;
}
