import micromatch from 'micromatch';
import { RULES } from '../rules/descriptors';
import { RULE_OFF, type RuleId, type RuleSetting, type Severity } from '../rules/types';
import type { FilePatternConfig } from './file-section-parser';
import type { FileResolution } from './types';

/**
 * Calculates a specificity score for a glob pattern.
 * Logic:
 * 1. Segments count (100 points each): Deeper paths > Shallow paths.
 * 2. Wildcards count (-10 points each): Explicit names > Wildcards.
 * 3. Length (1 point each): Longer patterns > Shorter patterns (Tie breaker).
 */
export function getSpecificityScore(pattern: string): number {
    const segments = pattern.split('/').length;
    const wildcards = (pattern.match(/[*]/g) || []).length;
    return (segments * 100) - (wildcards * 10) + pattern.length;
}

export class ScanPathResolver {
    /**
     * Resolves which rules run on a file and at which severity.
     *
     * Matching sections are applied from the least to the most specific.
     * A section with RunRules replaces the enabled set, severity settings
     * are merged with the more specific section winning. A file no section
     * matches runs every rule.
     *
     * @param filePath Path relative to the config directory, with forward slashes
     */
    resolveConfiguration(
        filePath: string,
        sections: FilePatternConfig[],
        defaultSeverity?: Severity
    ): FileResolution {
        const matches = sections
            .filter((section) => micromatch.isMatch(filePath, section.pattern))
            .sort((a, b) => getSpecificityScore(a.pattern) - getSpecificityScore(b.pattern));

        let enabled: ReadonlySet<RuleId> = new Set(RULES.map((rule) => rule.id));
        let overrides: Partial<Record<RuleId, RuleSetting>> = {};
        for (const match of matches) {
            if (match.runRules) {
                enabled = new Set(match.runRules);
            }
            overrides = { ...overrides, ...match.severities };
        }

        const severities = new Map<RuleId, Severity>();
        for (const rule of RULES) {
            if (!enabled.has(rule.id)) continue;
            const setting = overrides[rule.id] ?? defaultSeverity ?? rule.defaultSeverity;
            if (setting === RULE_OFF) continue;
            severities.set(rule.id, setting);
        }

        return { severities };
    }
}
