import { RuleId } from '../rules/types';
import { TriviaKind, type SyntaxNode, type SyntaxTree } from '../syntax/types';
import { indexAfterWhitespace, leadingWhitespaceRun, renderedWidth } from './trivia';
import type { DiagnosticSink } from './types';

const OPENING_BRACE = '{';
const TRAILING_COMMENT_GAP = 2;

/*
 * Every new group of leading comments needs an empty line (or a line holding
 * nothing but `{`) above it. Comment lines that directly follow another
 * comment line continue the same group and are not checked.
 */
export function checkLeadingCommentSpace(
  node: SyntaxNode,
  tree: SyntaxTree,
  report: DiagnosticSink
): void {
  if (node.leadingTrivia.length === 0) return;

  let previousLine: number | undefined;
  for (const comment of node.leadingTrivia) {
    if (comment.kind !== TriviaKind.LineComment) continue;

    const line = comment.span.start.line;
    const continuation = previousLine !== undefined && line === previousLine + 1;
    previousLine = line;
    if (continuation) continue;

    const lineAbove = tree.lineText(line - 1).trim();
    if (lineAbove === '' || lineAbove === OPENING_BRACE) continue;

    report(RuleId.NewlineBeforeComment, comment.span);
  }
}

/*
 * A comment on the same line as the code must be separated from it by
 * exactly two columns of whitespace.
 */
export function checkTrailingCommentSpace(
  node: SyntaxNode,
  report: DiagnosticSink,
  tabWidth: number
): void {
  const trivia = node.trailingTrivia;
  if (trivia.length === 0) return;

  const comment = trivia[indexAfterWhitespace(trivia)];
  if (!comment || comment.kind !== TriviaKind.LineComment) return;

  const gap = renderedWidth(leadingWhitespaceRun(trivia), tabWidth);
  if (gap === TRAILING_COMMENT_GAP) return;

  report(RuleId.SpacesBeforeTrailingComment, comment.span);
}
