import type { Issue } from './json-formatter';
import { Severity } from '../rules/types';

export type RdJsonSeverity = 'ERROR' | 'WARNING';

export interface RdJsonPosition {
    line: number;
    column: number;
}

export interface RdJsonDiagnostic {
    message: string;
    location: {
        path: string;
        range: {
            start: RdJsonPosition;
            end: RdJsonPosition;
        };
    };
    severity: RdJsonSeverity;
    code: {
        value: string;
    };
}

export interface RdJsonResult {
    source: {
        name: string;
    };
    diagnostics: RdJsonDiagnostic[];
}

/**
 * Collects issues in reviewdog's diagnostic format (rdjson).
 */
export class RdJsonFormatter {
    private files: Record<string, Issue[]> = {};

    addFile(file: string): void {
        this.files[file] ??= [];
    }

    addIssue(file: string, issue: Issue): void {
        const issues = (this.files[file] ??= []);
        issues.push(issue);
    }

    toRdJsonFormat(): RdJsonResult {
        const diagnostics: RdJsonDiagnostic[] = [];

        for (const [filePath, issues] of Object.entries(this.files)) {
            for (const issue of issues) {
                diagnostics.push({
                    message: issue.message,
                    location: {
                        path: filePath,
                        range: {
                            start: { line: issue.line, column: issue.column },
                            end: { line: issue.endLine, column: issue.endColumn },
                        },
                    },
                    severity: issue.severity === Severity.ERROR ? 'ERROR' : 'WARNING',
                    code: {
                        value: issue.rule,
                    },
                });
            }
        }

        return {
            source: {
                name: 'commentlint',
            },
            diagnostics,
        };
    }

    toJson(): string {
        return JSON.stringify(this.toRdJsonFormat(), null, 2);
    }
}
