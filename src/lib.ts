// Analysis core
export { analyzeTree, DEFAULT_ANALYZER_OPTIONS } from './analyzer/comment-analyzer';
export { analyzeBlock, isSingleLineBlock } from './analyzer/block-analyzer';
export { analyzeComments, checkCommentPrefix, hasSpaceAfterMarker } from './analyzer/comment-prefix';
export { checkLeadingCommentSpace, checkTrailingCommentSpace } from './analyzer/comment-spacing';
export {
  partitionSegments,
  isSegmentCommented,
  isTerminalException,
  checkSegmentComments,
  TERMINAL_STATEMENT_KINDS,
} from './analyzer/segments';
export type { Segment } from './analyzer/segments';
export {
  leadingWhitespaceRun,
  countLineBreaksAfter,
  lastIndexOfKind,
  renderedWidth,
} from './analyzer/trivia';
export type { AnalyzerOptions, BlockAnalysisContext, Diagnostic, DiagnosticSink } from './analyzer/types';

// Syntax model
export { NodeKind, TriviaKind, comparePositions } from './syntax/types';
export type { Position, Span, SyntaxNode, SyntaxTree, Trivia } from './syntax/types';
export { createTypeScriptTree, TypeScriptSyntaxTree } from './syntax/typescript-tree';

// Rules
export { RULES, getRuleDescriptor, isRuleId } from './rules/descriptors';
export { RuleId, Severity, RULE_OFF } from './rules/types';
export type { RuleDescriptor, RuleSetting } from './rules/types';

// Configuration and linting
export { loadConfig } from './boundaries/config-loader';
export { lintFile, lintFiles } from './cli/orchestrator';
export { OutputFormat } from './cli/types';
export type { FileLintResult, LintOptions, LintResult } from './cli/types';
export { CommentlintError, ConfigError, ProcessingError, ValidationError } from './errors/index';
