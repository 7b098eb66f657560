import { RuleId } from '../rules/types';
import { NodeKind, TriviaKind, type SyntaxNode } from '../syntax/types';
import { countLineBreaksAfter, lastIndexOfKind } from './trivia';
import type { DiagnosticSink } from './types';

/*
 * A maximal run of sibling statements with no empty line between them.
 * Segments are built per block and discarded once the block is checked.
 */
export interface Segment {
  readonly nodes: readonly SyntaxNode[];
  readonly first: SyntaxNode;
  readonly last: SyntaxNode;
}

/**
 * Statement kinds that may end a block on their own without a comment.
 *
 * Closed on purpose: every kind added here changes which blocks need no
 * comment at all.
 */
export const TERMINAL_STATEMENT_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.Return,
  NodeKind.SimpleAssignment,
  NodeKind.AddAssignment,
  NodeKind.SubtractAssignment,
  NodeKind.Invocation,
  NodeKind.Throw,
]);

type PartitionState =
  | { kind: 'no-segment' }
  | { kind: 'in-segment'; nodes: SyntaxNode[]; first: SyntaxNode; last: SyntaxNode; lastEndLine: number };

function startSegment(node: SyntaxNode): PartitionState {
  return { kind: 'in-segment', nodes: [node], first: node, last: node, lastEndLine: node.span.end.line };
}

/*
 * Splits a block's children into segments. A node joins the current segment
 * when it starts at most one line below the end of the previous node.
 */
export function partitionSegments(children: readonly SyntaxNode[]): Segment[] {
  const segments: Segment[] = [];
  let state: PartitionState = { kind: 'no-segment' };

  for (const node of children) {
    if (state.kind === 'no-segment') {
      state = startSegment(node);
      continue;
    }

    if (node.span.start.line <= state.lastEndLine + 1) {
      state.nodes.push(node);
      state.last = node;
      state.lastEndLine = node.span.end.line;
      continue;
    }

    segments.push({ nodes: state.nodes, first: state.first, last: state.last });
    state = startSegment(node);
  }

  if (state.kind === 'in-segment') {
    segments.push({ nodes: state.nodes, first: state.first, last: state.last });
  }
  return segments;
}

/*
 * A segment is commented when the leading trivia of its first node hold a line
 * comment with at most one line break between it and the node.
 */
export function isSegmentCommented(segment: Segment): boolean {
  const trivia = segment.first.leadingTrivia;
  const lastComment = lastIndexOfKind(trivia, TriviaKind.LineComment);
  if (lastComment < 0) return false;
  return countLineBreaksAfter(trivia, lastComment) <= 1;
}

export function isTerminalException(segment: Segment): boolean {
  return segment.nodes.length === 1 && TERMINAL_STATEMENT_KINDS.has(segment.first.kind);
}

export function checkSegmentComments(segments: readonly Segment[], report: DiagnosticSink): void {
  segments.forEach((segment, index) => {
    // Terminal exception
    if (index === segments.length - 1 && isTerminalException(segment)) return;
    if (isSegmentCommented(segment)) return;

    report(RuleId.CommentedSegments, {
      start: segment.first.span.start,
      end: segment.last.span.end,
    });
  });
}
