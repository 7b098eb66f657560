export enum Severity {
  ERROR = 'error',
  WARNING = 'warning',
}

export enum RuleId {
  CommentedSegments = 'CommentedSegments',
  NewlineBeforeComment = 'NewlineBeforeComment',
  SpacesBeforeTrailingComment = 'SpacesBeforeTrailingComment',
  CommentStartsWithSpace = 'CommentStartsWithSpace',
}

export const RULE_OFF = 'off';

// Severity a rule runs at for one file, or disabled
export type RuleSetting = Severity | typeof RULE_OFF;

export interface RuleDescriptor {
  readonly id: RuleId;
  readonly category: 'Comments';
  readonly title: string;
  readonly message: string;
  readonly defaultSeverity: Severity;
}
