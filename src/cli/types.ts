import type { FilePatternConfig } from "../boundaries/file-section-parser";
import type { Issue } from "../output/json-formatter";
import type { Severity } from "../rules/types";

export enum OutputFormat {
  Line = "line",
  Json = "json",
  RdJson = "rdjson",
}

export interface LintOptions {
  scanPaths: FilePatternConfig[];
  configDir: string;
  concurrency: number;
  tabWidth: number;
  defaultSeverity?: Severity;
  verbose: boolean;
  outputFormat?: OutputFormat;
  // Base for the paths shown in the output
  cwd?: string;
}

export interface LintResult {
  totalFiles: number;
  totalErrors: number;
  totalWarnings: number;
  skippedFiles: number;
  failedFiles: number;
  hadOperationalErrors: boolean;
  hadSeverityErrors: boolean;
}

export type FileLintResult =
  | { status: "linted"; file: string; relFile: string; issues: Issue[] }
  | { status: "skipped"; file: string; relFile: string; reason: string }
  | { status: "failed"; file: string; relFile: string; error: Error };
