import type { RuleId } from '../rules/types';
import type { Span, SyntaxTree } from '../syntax/types';

/*
 * Receives every violation found by the checkers. Supplied per invocation by
 * the caller; the analyzer never keeps a reference to it.
 */
export type DiagnosticSink = (ruleId: RuleId, location: Span) => void;

export interface Diagnostic {
  ruleId: RuleId;
  location: Span;
  filePath: string;
}

export interface AnalyzerOptions {
  // Width a tab renders at when measuring the gap before a trailing comment
  tabWidth: number;
}

export interface BlockAnalysisContext extends AnalyzerOptions {
  tree: SyntaxTree;
  report: DiagnosticSink;
}
