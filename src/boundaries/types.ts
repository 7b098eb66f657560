import type { RuleId, Severity } from '../rules/types';

// Rules that apply to one file, each at its effective severity
export interface FileResolution {
    severities: ReadonlyMap<RuleId, Severity>;
}
