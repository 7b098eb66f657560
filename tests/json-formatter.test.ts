import { describe, it, expect } from 'vitest';
import { JsonFormatter, type Issue } from '../src/output/json-formatter.js';
import { RuleId, Severity } from '../src/rules/types.js';

const issue = (severity: Severity, line: number): Issue => ({
    line,
    column: 3,
    endLine: line,
    endColumn: 9,
    severity,
    message: 'Code segment must be preceded by a comment',
    rule: RuleId.CommentedSegments,
});

describe('JsonFormatter', () => {
    it('groups issues by file and counts severities', () => {
        const formatter = new JsonFormatter();
        formatter.addFile('src/clean.ts');
        formatter.addFile('src/app.ts');
        formatter.addIssue('src/app.ts', issue(Severity.WARNING, 4));
        formatter.addIssue('src/app.ts', issue(Severity.ERROR, 10));

        const result = formatter.toResult();

        expect(result.files).toEqual({
            'src/clean.ts': { issues: [] },
            'src/app.ts': { issues: [issue(Severity.WARNING, 4), issue(Severity.ERROR, 10)] },
        });
        expect(result.summary).toEqual({ files: 2, errors: 1, warnings: 1 });
        expect(result.metadata.version).toMatch(/^\d+\.\d+\.\d+/);
    });

    it('registers a file on its first issue', () => {
        const formatter = new JsonFormatter();
        formatter.addIssue('src/app.ts', issue(Severity.WARNING, 1));

        expect(Object.keys(formatter.toResult().files)).toEqual(['src/app.ts']);
    });

    it('serializes to parseable JSON', () => {
        const formatter = new JsonFormatter();
        formatter.addFile('src/clean.ts');

        const parsed: unknown = JSON.parse(formatter.toJson());

        expect(parsed).toMatchObject({ files: { 'src/clean.ts': { issues: [] } }, summary: { files: 1 } });
    });
});
