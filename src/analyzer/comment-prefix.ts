import { RuleId } from '../rules/types';
import { TriviaKind, type SyntaxTree, type Trivia } from '../syntax/types';
import type { DiagnosticSink } from './types';

const COMMENT_MARKER = '//';

// `//` or `///`, then a space or the end of the text
const SPACE_AFTER_MARKER = /^\/\/\/?(?: |$)/;

/*
 * True when the comment has a space after its slashes, false when it does not,
 * undefined when the text is not a `//` comment at all.
 */
export function hasSpaceAfterMarker(text: string): boolean | undefined {
  if (!text.startsWith(COMMENT_MARKER)) return undefined;
  return SPACE_AFTER_MARKER.test(text);
}

export function checkCommentPrefix(comment: Trivia, report: DiagnosticSink): void {
  if (hasSpaceAfterMarker(comment.text) === false) {
    report(RuleId.CommentStartsWithSpace, comment.span);
  }
}

/**
 * Checks every line comment in the tree, wherever it sits: statement
 * trivia, expressions, class bodies or the end of the file.
 */
export function analyzeComments(tree: SyntaxTree, report: DiagnosticSink): void {
  for (const comment of tree.commentTrivia()) {
    if (comment.kind !== TriviaKind.LineComment) continue;
    checkCommentPrefix(comment, report);
  }
}
