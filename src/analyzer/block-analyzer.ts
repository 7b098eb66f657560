import type { SyntaxNode } from '../syntax/types';
import { checkLeadingCommentSpace, checkTrailingCommentSpace } from './comment-spacing';
import { checkSegmentComments, partitionSegments } from './segments';
import type { BlockAnalysisContext } from './types';

export function isSingleLineBlock(block: SyntaxNode): boolean {
  return block.span.start.line === block.span.end.line;
}

/**
 * Checks one block: comment spacing around each direct child, then the
 * comment requirement for each segment of children.
 *
 * Blocks that open and close on the same line are skipped entirely.
 */
export function analyzeBlock(block: SyntaxNode, context: BlockAnalysisContext): void {
  if (isSingleLineBlock(block)) return;

  const { tree, report, tabWidth } = context;
  for (const child of block.children) {
    checkLeadingCommentSpace(child, tree, report);
    checkTrailingCommentSpace(child, report, tabWidth);
  }

  checkSegmentComments(partitionSegments(block.children), report);
}
