import { readFile } from "fs/promises";
import * as path from "path";
import { ScanPathResolver } from "../boundaries/scan-path-resolver";
import { JsonFormatter, type Issue } from "../output/json-formatter";
import { RdJsonFormatter } from "../output/rdjson-formatter";
import { printFileHeader, printIssueRow } from "../output/reporter";
import { debug, error, log, setVerboseMode } from "../output/logger";
import { ProcessingError, handleUnknownError } from "../errors/index";
import { analyzeTree } from "../analyzer/comment-analyzer";
import type { Diagnostic } from "../analyzer/types";
import { createTypeScriptTree } from "../syntax/typescript-tree";
import { isGeneratedSource } from "../scan/generated-code";
import { getRuleDescriptor } from "../rules/descriptors";
import { Severity } from "../rules/types";
import { OutputFormat } from "./types";
import type { FileLintResult, LintOptions, LintResult } from "./types";

/*
 * Generic concurrency runner that executes workers in parallel up to a specified limit.
 * Preserves result order matching input order.
 */
export async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let i = 0;
  const workers = new Array(Math.max(1, Math.min(limit, items.length)))
    .fill(0)
    .map(async () => {
      while (true) {
        const idx = i++;
        if (idx >= items.length) break;
        const item = items[idx];
        if (item !== undefined) {
          results[idx] = await worker(item, idx);
        }
      }
    });
  await Promise.all(workers);
  return results;
}

function toPosixPath(p: string): string {
  return p.split(path.sep).join("/");
}

/*
 * Converts a zero-based diagnostic to a one-based issue at the severity the
 * rule runs at for this file.
 */
export function toIssue(diagnostic: Diagnostic, severity: Severity): Issue {
  const { start, end } = diagnostic.location;
  return {
    line: start.line + 1,
    column: start.column + 1,
    endLine: end.line + 1,
    endColumn: end.column + 1,
    severity,
    message: getRuleDescriptor(diagnostic.ruleId).message,
    rule: diagnostic.ruleId,
  };
}

/*
 * Lints a single file. Never throws: read and parse failures come back as a
 * failed result.
 */
export async function lintFile(
  file: string,
  options: LintOptions,
  resolver: ScanPathResolver = new ScanPathResolver()
): Promise<FileLintResult> {
  const cwd = options.cwd ?? process.cwd();
  const relFile = path.relative(cwd, file) || file;

  try {
    const content = await readFile(file, "utf-8");
    if (isGeneratedSource(content)) {
      return { status: "skipped", file, relFile, reason: "generated source" };
    }

    const configRel = toPosixPath(path.relative(options.configDir, file));
    const { severities } = resolver.resolveConfiguration(
      configRel,
      options.scanPaths,
      options.defaultSeverity
    );
    if (severities.size === 0) {
      return { status: "skipped", file, relFile, reason: "no rules enabled" };
    }

    const tree = createTypeScriptTree(file, content);
    const issues: Issue[] = [];
    for (const diagnostic of analyzeTree(tree, { tabWidth: options.tabWidth })) {
      const severity = severities.get(diagnostic.ruleId);
      if (severity === undefined) continue;
      issues.push(toIssue(diagnostic, severity));
    }
    return { status: "linted", file, relFile, issues };
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Processing file ${file}`);
    return {
      status: "failed",
      file,
      relFile,
      error: new ProcessingError(err.message, file),
    };
  }
}

/*
 * Lints every target and reports the results in target order: rows for the
 * line format, one JSON document on stdout for the json formats.
 */
export async function lintFiles(
  targets: string[],
  options: LintOptions
): Promise<LintResult> {
  const { outputFormat = OutputFormat.Line } = options;
  const resolver = new ScanPathResolver();
  setVerboseMode(options.verbose);

  const results = await runWithConcurrency(targets, options.concurrency, (file) => {
    debug(`Linting ${file}`);
    return lintFile(file, options, resolver);
  });

  let jsonFormatter: JsonFormatter | RdJsonFormatter | undefined;
  if (outputFormat === OutputFormat.Json) {
    jsonFormatter = new JsonFormatter();
  } else if (outputFormat === OutputFormat.RdJson) {
    jsonFormatter = new RdJsonFormatter();
  }

  const summary: LintResult = {
    totalFiles: 0,
    totalErrors: 0,
    totalWarnings: 0,
    skippedFiles: 0,
    failedFiles: 0,
    hadOperationalErrors: false,
    hadSeverityErrors: false,
  };

  for (const result of results) {
    switch (result.status) {
      case "skipped":
        summary.skippedFiles += 1;
        debug(`Skipped ${result.relFile}: ${result.reason}`);
        break;
      case "failed":
        summary.failedFiles += 1;
        summary.hadOperationalErrors = true;
        error(`failed to lint ${result.relFile}: ${result.error.message}`);
        break;
      case "linted": {
        summary.totalFiles += 1;
        for (const issue of result.issues) {
          if (issue.severity === Severity.ERROR) {
            summary.totalErrors += 1;
            summary.hadSeverityErrors = true;
          } else {
            summary.totalWarnings += 1;
          }
        }

        if (jsonFormatter) {
          jsonFormatter.addFile(result.relFile);
          for (const issue of result.issues) {
            jsonFormatter.addIssue(result.relFile, issue);
          }
        } else if (result.issues.length > 0) {
          printFileHeader(result.relFile);
          for (const issue of result.issues) {
            printIssueRow(`${issue.line}:${issue.column}`, issue.severity, issue.message, issue.rule);
          }
          log("");
        }
        break;
      }
    }
  }

  // Output results based on format (always to stdout for JSON formats)
  if (jsonFormatter) {
    console.log(jsonFormatter.toJson());
  }

  return summary;
}
