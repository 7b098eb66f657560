import ts from 'typescript';
import path from 'path';
import {
  NodeKind,
  TriviaKind,
  comparePositions,
  type Position,
  type Span,
  type SyntaxNode,
  type SyntaxTree,
  type Trivia,
} from './types';

const SCRIPT_KINDS: Record<string, ts.ScriptKind> = {
  '.ts': ts.ScriptKind.TS,
  '.mts': ts.ScriptKind.TS,
  '.cts': ts.ScriptKind.TS,
  '.tsx': ts.ScriptKind.TSX,
  '.js': ts.ScriptKind.JS,
  '.mjs': ts.ScriptKind.JS,
  '.cjs': ts.ScriptKind.JS,
  '.jsx': ts.ScriptKind.JSX,
};

function scriptKindFor(filePath: string): ts.ScriptKind {
  return SCRIPT_KINDS[path.extname(filePath).toLowerCase()] ?? ts.ScriptKind.TS;
}

function triviaKindOf(kind: ts.SyntaxKind): TriviaKind | undefined {
  switch (kind) {
    case ts.SyntaxKind.WhitespaceTrivia:
      return TriviaKind.Whitespace;
    case ts.SyntaxKind.NewLineTrivia:
      return TriviaKind.EndOfLine;
    case ts.SyntaxKind.SingleLineCommentTrivia:
      return TriviaKind.LineComment;
    case ts.SyntaxKind.MultiLineCommentTrivia:
    case ts.SyntaxKind.ConflictMarkerTrivia:
    case ts.SyntaxKind.ShebangTrivia:
      return TriviaKind.Other;
    default:
      return undefined;
  }
}

function expressionKind(expression: ts.Expression): NodeKind {
  if (ts.isCallExpression(expression)) return NodeKind.Invocation;
  if (ts.isBinaryExpression(expression)) {
    switch (expression.operatorToken.kind) {
      case ts.SyntaxKind.EqualsToken:
        return NodeKind.SimpleAssignment;
      case ts.SyntaxKind.PlusEqualsToken:
        return NodeKind.AddAssignment;
      case ts.SyntaxKind.MinusEqualsToken:
        return NodeKind.SubtractAssignment;
    }
  }
  return NodeKind.Expression;
}

function statementKind(statement: ts.Statement): NodeKind {
  if (ts.isReturnStatement(statement)) return NodeKind.Return;
  if (ts.isThrowStatement(statement)) return NodeKind.Throw;
  if (ts.isExpressionStatement(statement)) return expressionKind(statement.expression);
  if (ts.isIfStatement(statement)) return NodeKind.If;
  if (
    ts.isForStatement(statement) ||
    ts.isForInStatement(statement) ||
    ts.isForOfStatement(statement) ||
    ts.isWhileStatement(statement) ||
    ts.isDoStatement(statement)
  ) {
    return NodeKind.Loop;
  }
  if (ts.isSwitchStatement(statement)) return NodeKind.Switch;
  if (ts.isTryStatement(statement)) return NodeKind.Try;
  if (
    ts.isVariableStatement(statement) ||
    ts.isFunctionDeclaration(statement) ||
    ts.isClassDeclaration(statement) ||
    ts.isInterfaceDeclaration(statement) ||
    ts.isTypeAliasDeclaration(statement) ||
    ts.isEnumDeclaration(statement) ||
    ts.isModuleDeclaration(statement) ||
    ts.isImportDeclaration(statement) ||
    ts.isExportDeclaration(statement)
  ) {
    return NodeKind.Declaration;
  }
  return NodeKind.Other;
}

function isJsDocNode(node: ts.Node): boolean {
  return node.kind >= ts.SyntaxKind.FirstJSDocNode && node.kind <= ts.SyntaxKind.LastJSDocNode;
}

/*
 * SyntaxTree backed by a TypeScript source file.
 *
 * The node model is built eagerly on construction. Trivia follow the usual
 * leading/trailing split: a token owns the trivia after it up to and including
 * the first line break, the next token owns the rest.
 */
export class TypeScriptSyntaxTree implements SyntaxTree {
  readonly root: SyntaxNode;
  private readonly text: string;
  private readonly scanner: ts.Scanner;
  private comments: readonly Trivia[] | undefined;

  constructor(
    readonly filePath: string,
    private readonly sourceFile: ts.SourceFile
  ) {
    this.text = sourceFile.text;
    this.scanner = ts.createScanner(ts.ScriptTarget.Latest, false, sourceFile.languageVariant);
    this.root = {
      kind: NodeKind.SourceFile,
      span: this.spanOf(0, this.text.length),
      leadingTrivia: [],
      trailingTrivia: [],
      children: sourceFile.statements.map((s) => this.convertStatement(s)),
    };
  }

  commentTrivia(): readonly Trivia[] {
    if (!this.comments) {
      this.comments = this.collectComments();
    }
    return this.comments;
  }

  lineText(line: number): string {
    const starts = this.sourceFile.getLineStarts();
    const start = starts[line];
    if (line < 0 || start === undefined) return '';
    const end = starts[line + 1] ?? this.text.length;
    return this.text.slice(start, end).replace(/(?:\r\n|\r|\n|\u2028|\u2029)$/, '');
  }

  private convertStatement(statement: ts.Statement): SyntaxNode {
    if (ts.isBlock(statement)) {
      return this.convertBlock(statement);
    }
    return this.createNode(statement, statementKind(statement), this.nestedBlocks(statement));
  }

  private convertBlock(block: ts.Block): SyntaxNode {
    return this.createNode(
      block,
      NodeKind.Block,
      block.statements.map((s) => this.convertStatement(s))
    );
  }

  private nestedBlocks(node: ts.Node): SyntaxNode[] {
    const blocks: SyntaxNode[] = [];
    const visit = (child: ts.Node): void => {
      if (ts.isBlock(child)) {
        blocks.push(this.convertBlock(child));
        return;
      }
      ts.forEachChild(child, visit);
    };
    ts.forEachChild(node, visit);
    return blocks;
  }

  private createNode(node: ts.Node, kind: NodeKind, children: SyntaxNode[]): SyntaxNode {
    const start = node.getStart(this.sourceFile);
    return {
      kind,
      span: this.spanOf(start, node.getEnd()),
      leadingTrivia: this.leadingTriviaOf(node.getFullStart(), start),
      trailingTrivia: this.scanTrivia(node.getEnd(), this.text.length, true),
      children,
    };
  }

  private leadingTriviaOf(fullStart: number, start: number): Trivia[] {
    if (fullStart === 0) {
      return this.scanTrivia(0, start, false);
    }

    // Skip what the previous token owns as trailing trivia
    const owned = this.scanTrivia(fullStart, start, true);
    const last = owned[owned.length - 1];
    if (!last || last.kind !== TriviaKind.EndOfLine) {
      return [];
    }
    return this.scanTrivia(fullStart + owned.reduce((n, t) => n + t.text.length, 0), start, false);
  }

  private scanTrivia(start: number, end: number, stopAfterLineBreak: boolean): Trivia[] {
    const trivia: Trivia[] = [];
    this.scanner.setText(this.text, start, end - start);
    let pos = start;
    while (pos < end) {
      const kind = triviaKindOf(this.scanner.scan());
      const next = this.scanner.getTextPos();
      if (kind === undefined || next <= pos) break;

      trivia.push({ kind, span: this.spanOf(pos, next), text: this.text.slice(pos, next) });
      pos = next;
      if (stopAfterLineBreak && kind === TriviaKind.EndOfLine) break;
    }
    return trivia;
  }

  private collectComments(): Trivia[] {
    const byStart = new Map<number, ts.CommentRange>();
    const jsxText: Array<{ pos: number; end: number }> = [];
    const add = (ranges: ts.CommentRange[] | undefined): void => {
      for (const range of ranges ?? []) {
        if (!byStart.has(range.pos)) byStart.set(range.pos, range);
      }
    };

    const visit = (node: ts.Node): void => {
      if (isJsDocNode(node)) return;
      if (node.kind === ts.SyntaxKind.JsxText) {
        jsxText.push({ pos: node.pos, end: node.end });
        return;
      }
      add(ts.getLeadingCommentRanges(this.text, node.pos));
      add(ts.getTrailingCommentRanges(this.text, node.end));
      for (const child of node.getChildren(this.sourceFile)) {
        visit(child);
      }
    };
    visit(this.sourceFile);

    return Array.from(byStart.values())
      .filter((range) => !jsxText.some((t) => range.pos >= t.pos && range.pos < t.end))
      .map((range) => ({
        kind:
          range.kind === ts.SyntaxKind.SingleLineCommentTrivia
            ? TriviaKind.LineComment
            : TriviaKind.Other,
        span: this.spanOf(range.pos, range.end),
        text: this.text.slice(range.pos, range.end),
      }))
      .sort((a, b) => comparePositions(a.span.start, b.span.start));
  }

  private positionOf(offset: number): Position {
    const { line, character } = this.sourceFile.getLineAndCharacterOfPosition(offset);
    return { line, column: character };
  }

  private spanOf(start: number, end: number): Span {
    return { start: this.positionOf(start), end: this.positionOf(end) };
  }
}

/**
 * Parses TypeScript or JavaScript source into the analyzer's tree model.
 * The script kind (TS, TSX, JS, JSX) follows the file extension.
 */
export function createTypeScriptTree(filePath: string, text: string): SyntaxTree {
  const sourceFile = ts.createSourceFile(
    filePath,
    text,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(filePath)
  );
  return new TypeScriptSyntaxTree(filePath, sourceFile);
}
