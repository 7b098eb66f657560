import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { lintFile, lintFiles, runWithConcurrency } from '../src/cli/orchestrator.js';
import { OutputFormat, type LintOptions } from '../src/cli/types.js';
import { ProcessingError } from '../src/errors/index.js';
import { setSilentMode, setVerboseMode } from '../src/output/logger.js';
import { RuleId, Severity } from '../src/rules/types.js';

const UNCOMMENTED = 'export function f()\n{\n  const a = 1;\n  g(a);\n}\n';
const CLEAN = 'export function f()\n{\n  // compute\n  const a = 1;\n  g(a);\n}\n';

describe('orchestrator', () => {
    let dir: string;
    let options: LintOptions;

    const write = (name: string, content: string) => {
        const full = path.join(dir, name);
        writeFileSync(full, content);
        return full;
    };

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'commentlint-run-'));
        options = {
            scanPaths: [{ pattern: '**/*.ts', severities: {} }],
            configDir: dir,
            concurrency: 2,
            tabWidth: 4,
            verbose: false,
            cwd: dir,
        };
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
        setSilentMode(false);
        setVerboseMode(false);
    });

    describe('lintFile', () => {
        it('returns one-based issues with resolved severities', async () => {
            const file = write('sample.ts', UNCOMMENTED);

            const result = await lintFile(file, options);

            expect(result).toEqual({
                status: 'linted',
                file,
                relFile: 'sample.ts',
                issues: [
                    {
                        line: 3,
                        column: 3,
                        endLine: 4,
                        endColumn: 8,
                        severity: Severity.WARNING,
                        message: 'Code segment must be preceded by a comment',
                        rule: RuleId.CommentedSegments,
                    },
                ],
            });
        });

        it('drops diagnostics of rules that are not enabled', async () => {
            const file = write('sample.ts', UNCOMMENTED);

            const result = await lintFile(file, {
                ...options,
                scanPaths: [{ pattern: '**/*.ts', runRules: [RuleId.CommentStartsWithSpace], severities: {} }],
            });

            expect(result).toEqual({ status: 'linted', file, relFile: 'sample.ts', issues: [] });
        });

        it('skips generated sources', async () => {
            const file = write('gen.ts', `// @generated by a tool\n${UNCOMMENTED}`);

            const result = await lintFile(file, options);

            expect(result).toEqual({ status: 'skipped', file, relFile: 'gen.ts', reason: 'generated source' });
        });

        it('skips files with every rule disabled', async () => {
            const file = write('sample.ts', UNCOMMENTED);

            const result = await lintFile(file, {
                ...options,
                scanPaths: [{ pattern: '**/*.ts', runRules: [], severities: {} }],
            });

            expect(result).toEqual({ status: 'skipped', file, relFile: 'sample.ts', reason: 'no rules enabled' });
        });

        it('reports unreadable files as failures', async () => {
            const file = path.join(dir, 'missing.ts');

            const result = await lintFile(file, options);

            expect(result.status).toBe('failed');
            if (result.status === 'failed') {
                expect(result.error).toBeInstanceOf(ProcessingError);
                expect(result.error).toMatchObject({ file });
            }
        });
    });

    describe('lintFiles', () => {
        it('prints one JSON document and counts severities', async () => {
            const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
            setSilentMode(true);
            const clean = write('clean.ts', CLEAN);
            const dirty = write('dirty.ts', UNCOMMENTED);

            const result = await lintFiles([clean, dirty], {
                ...options,
                defaultSeverity: Severity.ERROR,
                outputFormat: OutputFormat.Json,
            });

            expect(result).toEqual({
                totalFiles: 2,
                totalErrors: 1,
                totalWarnings: 0,
                skippedFiles: 0,
                failedFiles: 0,
                hadOperationalErrors: false,
                hadSeverityErrors: true,
            });
            expect(logSpy).toHaveBeenCalledTimes(1);
            const output: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
            expect(output).toMatchObject({
                files: {
                    'clean.ts': { issues: [] },
                    'dirty.ts': { issues: [{ line: 3, rule: 'CommentedSegments', severity: 'error' }] },
                },
                summary: { files: 2, errors: 1, warnings: 0 },
            });
        });

        it('flags operational errors for unreadable files', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => {});
            const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

            const result = await lintFiles([path.join(dir, 'missing.ts')], options);

            expect(result.failedFiles).toBe(1);
            expect(result.hadOperationalErrors).toBe(true);
            expect(errorSpy).toHaveBeenCalledTimes(1);
        });

        it('prints rows in the line format', async () => {
            const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
            const dirty = write('dirty.ts', UNCOMMENTED);

            const result = await lintFiles([dirty], options);

            expect(result.totalWarnings).toBe(1);
            expect(result.hadSeverityErrors).toBe(false);
            const printed = logSpy.mock.calls.map((call) => String(call[0]));
            expect(printed.some((line) => line.includes('dirty.ts'))).toBe(true);
            expect(printed.some((line) => line.includes('3:3') && line.includes('CommentedSegments'))).toBe(true);
        });

        it('reports progress and skipped files on stderr when verbose', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => {});
            const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
            const gen = write('gen.ts', `// @generated by a tool\n${UNCOMMENTED}`);

            await lintFiles([gen], { ...options, verbose: true });

            expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
                `[commentlint] Linting ${gen}`,
                '[commentlint] Skipped gen.ts: generated source',
            ]);
        });

        it('stays quiet on stderr when not verbose', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => {});
            const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
            setVerboseMode(true);
            const gen = write('gen.ts', `// @generated by a tool\n${UNCOMMENTED}`);

            await lintFiles([gen], options);

            expect(errorSpy).not.toHaveBeenCalled();
        });
    });

    describe('runWithConcurrency', () => {
        it('keeps results in input order', async () => {
            const delays = [30, 5, 15, 0];

            const results = await runWithConcurrency(delays, 2, async (delay, index) => {
                await new Promise((resolve) => setTimeout(resolve, delay));
                return index;
            });

            expect(results).toEqual([0, 1, 2, 3]);
        });

        it('handles an empty list', async () => {
            expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
        });
    });
});
