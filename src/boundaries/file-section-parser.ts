import { ConfigError } from '../errors/index';
import { isRuleId } from '../rules/descriptors';
import { RULE_OFF, Severity, type RuleId, type RuleSetting } from '../rules/types';
import type { FilePatternConfig } from '../schemas/config-schemas';

export type { FilePatternConfig } from '../schemas/config-schemas';

const RUN_RULES_KEY = 'RunRules';

function parseRuleSetting(value: string): RuleSetting | undefined {
    switch (value.trim().toLowerCase()) {
        case Severity.ERROR:
            return Severity.ERROR;
        case Severity.WARNING:
            return Severity.WARNING;
        case RULE_OFF:
            return RULE_OFF;
        default:
            return undefined;
    }
}

export class FileSectionParser {
    /**
     * Parses the raw configuration object to extract file sections.
     * File sections are keys that look like glob patterns, e.g. [src/**\/*.ts].
     * @param rawConfig The raw configuration object parsed from the INI file
     * @returns A list of parsed file pattern configurations
     */
    parseSections(rawConfig: Record<string, unknown>): FilePatternConfig[] {
        const sections: FilePatternConfig[] = [];

        for (const [pattern, value] of Object.entries(rawConfig)) {
            if (typeof value !== 'object' || value === null || Array.isArray(value)) continue;

            const section: FilePatternConfig = { pattern, severities: {} };
            for (const [key, raw] of Object.entries(value)) {
                const text = typeof raw === 'string' ? raw : String(raw);

                if (key === RUN_RULES_KEY) {
                    section.runRules = this.parseRuleList(pattern, text);
                    continue;
                }

                if (!isRuleId(key)) {
                    throw new ConfigError(`Unknown key "${key}" in [${pattern}]`);
                }
                const setting = parseRuleSetting(text);
                if (setting === undefined) {
                    throw new ConfigError(`Invalid setting for ${key} in [${pattern}]: ${text} (expected error, warning or off)`);
                }
                section.severities[key] = setting;
            }

            sections.push(section);
        }

        return sections;
    }

    private parseRuleList(pattern: string, value: string): RuleId[] {
        const names = value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
        return names.map((name) => {
            if (!isRuleId(name)) {
                throw new ConfigError(`Unknown rule "${name}" in RunRules of [${pattern}]`);
            }
            return name;
        });
    }
}
