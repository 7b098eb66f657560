import { getPackageVersion } from '../config/version';
import { Severity, type RuleId } from '../rules/types';

// One-based positions, end exclusive
export interface Issue {
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
  severity: Severity;
  message: string;
  rule: RuleId;
}

export interface FileResult {
  issues: Issue[];
}

export interface Result {
  files: Record<string, FileResult>;
  summary: {
    files: number;
    errors: number;
    warnings: number;
  };
  metadata: {
    version: string;
    timestamp: string;
  };
}

export class JsonFormatter {
  private files: Record<string, FileResult> = {};
  private errorCount = 0;
  private warningCount = 0;

  // Registers a linted file so that clean files still appear in the output
  addFile(file: string): void {
    this.files[file] ??= { issues: [] };
  }

  addIssue(file: string, issue: Issue): void {
    const entry = (this.files[file] ??= { issues: [] });
    entry.issues.push(issue);

    if (issue.severity === Severity.ERROR) {
      this.errorCount++;
    } else {
      this.warningCount++;
    }
  }

  toResult(): Result {
    return {
      files: this.files,
      summary: {
        files: Object.keys(this.files).length,
        errors: this.errorCount,
        warnings: this.warningCount,
      },
      metadata: {
        version: getPackageVersion(),
        timestamp: new Date().toISOString(),
      },
    };
  }

  toJson(): string {
    return JSON.stringify(this.toResult(), null, 2);
  }
}
