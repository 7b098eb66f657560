import { DEFAULT_TAB_WIDTH } from '../config/constants';
import { NodeKind, comparePositions, type SyntaxNode, type SyntaxTree } from '../syntax/types';
import { analyzeBlock } from './block-analyzer';
import { analyzeComments } from './comment-prefix';
import type { AnalyzerOptions, Diagnostic, DiagnosticSink } from './types';

export const DEFAULT_ANALYZER_OPTIONS: AnalyzerOptions = Object.freeze({ tabWidth: DEFAULT_TAB_WIDTH });

function forEachBlock(node: SyntaxNode, visit: (block: SyntaxNode) => void): void {
  if (node.kind === NodeKind.Block) visit(node);
  for (const child of node.children) {
    forEachBlock(child, visit);
  }
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    comparePositions(a.location.start, b.location.start) ||
    comparePositions(a.location.end, b.location.end) ||
    a.ruleId.localeCompare(b.ruleId)
  );
}

/*
 * Runs both entry points over a tree: the block checks once per block and the
 * comment prefix check once for the whole tree. Diagnostics come back sorted
 * by location; nothing is kept between calls.
 */
export function analyzeTree(
  tree: SyntaxTree,
  options: AnalyzerOptions = DEFAULT_ANALYZER_OPTIONS
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const report: DiagnosticSink = (ruleId, location) => {
    diagnostics.push({ ruleId, location, filePath: tree.filePath });
  };

  forEachBlock(tree.root, (block) => {
    analyzeBlock(block, { tree, report, tabWidth: options.tabWidth });
  });
  analyzeComments(tree, report);

  return diagnostics.sort(compareDiagnostics);
}
