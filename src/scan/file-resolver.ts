import fg from 'fast-glob';
import path from 'path';
import * as fs from 'fs';
import { ALLOWED_EXTS, DECLARATION_FILE } from '../config/constants';
import type { FilePatternConfig } from '../boundaries/file-section-parser';
import { warn } from '../output/logger';

const IGNORE = ['**/node_modules/**'];

function toGlobPath(p: string): string {
  return p.replace(/\\/g, '/');
}

function isLintable(filePath: string): boolean {
  if (DECLARATION_FILE.test(filePath)) return false;
  if (filePath.split(/[\\/]/).includes('node_modules')) return false;
  return ALLOWED_EXTS.has(path.extname(filePath).toLowerCase());
}

/**
 * Resolves the files to lint.
 *
 * CLI arguments win over the config: each one is a file, a directory (walked
 * recursively) or a glob relative to `cwd`. Without arguments the `[pattern]`
 * sections of the config are globbed relative to the config directory.
 * Returns absolute paths, deduplicated and sorted.
 */
export function resolveTargets(args: {
  cliArgs: string[];
  cwd: string;
  scanPaths: FilePatternConfig[];
  configDir: string;
}): string[] {
  const { cliArgs, cwd, scanPaths, configDir } = args;
  const options = { dot: false, onlyFiles: true, absolute: true, ignore: IGNORE };

  const files: string[] = [];
  if (cliArgs.length > 0) {
    for (const arg of cliArgs) {
      const absArg = path.resolve(cwd, arg);
      let found: string[] = [];
      if (fs.existsSync(absArg)) {
        const stat = fs.statSync(absArg);
        if (stat.isDirectory()) {
          found = fg.sync(`${toGlobPath(absArg)}/**/*`, options);
        } else if (stat.isFile()) {
          found = [absArg];
        }
      } else {
        // Try as glob
        found = fg.sync(toGlobPath(arg), { ...options, cwd });
      }
      if (found.length === 0) {
        warn(`No files matched ${arg}`);
      }
      files.push(...found);
    }
  } else {
    const patterns = scanPaths.map((section) =>
      toGlobPath(path.isAbsolute(section.pattern) ? section.pattern : path.resolve(configDir, section.pattern))
    );
    files.push(...fg.sync(patterns, options));
  }

  const dedup = new Set<string>();
  for (const f of files) {
    if (!isLintable(f)) continue;
    dedup.add(path.resolve(f));
  }
  return Array.from(dedup).sort();
}
