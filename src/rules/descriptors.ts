import { RuleId, Severity, type RuleDescriptor } from './types';

/** All code segments must be commented. */
export const COMMENTED_SEGMENTS: RuleDescriptor = Object.freeze({
  id: RuleId.CommentedSegments,
  category: 'Comments',
  title: 'Code segments must be commented',
  message: 'Code segment must be preceded by a comment',
  defaultSeverity: Severity.WARNING,
});

/** Comments must have an empty line before them. */
export const NEWLINE_BEFORE_COMMENT: RuleDescriptor = Object.freeze({
  id: RuleId.NewlineBeforeComment,
  category: 'Comments',
  title: 'Comments must be preceded by an empty line',
  message: 'Comment must be preceded by an empty line or an opening brace',
  defaultSeverity: Severity.WARNING,
});

/** Trailing comments are separated from the code by exactly two spaces. */
export const SPACES_BEFORE_TRAILING_COMMENT: RuleDescriptor = Object.freeze({
  id: RuleId.SpacesBeforeTrailingComment,
  category: 'Comments',
  title: 'Trailing comments must be separated by two spaces',
  message: 'Trailing comment must be separated from the code by exactly two spaces',
  defaultSeverity: Severity.WARNING,
});

/** Comment text starts with a space after the slashes. */
export const COMMENT_STARTS_WITH_SPACE: RuleDescriptor = Object.freeze({
  id: RuleId.CommentStartsWithSpace,
  category: 'Comments',
  title: 'Comments must start with a space',
  message: "Comment text must start with a space after '//'",
  defaultSeverity: Severity.WARNING,
});

export const RULES: readonly RuleDescriptor[] = Object.freeze([
  COMMENTED_SEGMENTS,
  NEWLINE_BEFORE_COMMENT,
  SPACES_BEFORE_TRAILING_COMMENT,
  COMMENT_STARTS_WITH_SPACE,
]);

const RULE_IDS: ReadonlySet<string> = new Set(Object.values(RuleId));

export function isRuleId(value: string): value is RuleId {
  return RULE_IDS.has(value);
}

export function getRuleDescriptor(id: RuleId): RuleDescriptor {
  switch (id) {
    case RuleId.CommentedSegments:
      return COMMENTED_SEGMENTS;
    case RuleId.NewlineBeforeComment:
      return NEWLINE_BEFORE_COMMENT;
    case RuleId.SpacesBeforeTrailingComment:
      return SPACES_BEFORE_TRAILING_COMMENT;
    case RuleId.CommentStartsWithSpace:
      return COMMENT_STARTS_WITH_SPACE;
  }
}
