import type { Command } from 'commander';
import { loadConfig } from '../boundaries/config-loader';
import { parseCliOptions } from '../boundaries/index';
import { resolveTargets } from '../scan/file-resolver';
import { printGlobalSummary } from '../output/reporter';
import { debug, error, setSilentMode, setVerboseMode } from '../output/logger';
import { handleUnknownError } from '../errors/index';
import type { Config } from '../schemas/config-schemas';
import { lintFiles } from './orchestrator';
import { OutputFormat } from './types';

/*
 * Registers the main lint command with Commander.
 * This is the default command that checks comment conventions in target files.
 */
export function registerMainCommand(program: Command): void {
  program
    .option('-v, --verbose', 'Print skipped files and per-file progress to stderr')
    .option('--output <format>', 'Output format: line (default), json, or rdjson', 'line')
    .option('--config <path>', 'Path to a custom .commentlint.ini config file')
    .option('--tab-width <n>', 'Columns a tab counts for before a trailing comment')
    .argument('[paths...]', 'files, directories or globs to lint (optional)')
    .action(async (paths: string[] = []) => {

      // Parse and validate CLI options
      let cliOptions;
      try {
        cliOptions = parseCliOptions(program.opts());
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing CLI options');
        error(err.message);
        process.exit(1);
      }

      setVerboseMode(cliOptions.verbose);
      setSilentMode(cliOptions.output !== OutputFormat.Line);

      let config: Config;
      try {
        config = loadConfig(process.cwd(), cliOptions.config);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Loading configuration');
        error(err.message);
        process.exit(1);
      }
      debug(`Using configuration from ${config.configDir}`);

      // Resolve target files
      let targets: string[] = [];
      try {
        targets = resolveTargets({
          cliArgs: paths,
          cwd: process.cwd(),
          scanPaths: config.scanPaths,
          configDir: config.configDir,
        });
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Resolving target files');
        error(`failed to resolve target files: ${err.message}`);
        process.exit(1);
      }

      if (targets.length === 0) {
        error('no target files found to lint.');
        process.exit(1);
      }

      const result = await lintFiles(targets, {
        scanPaths: config.scanPaths,
        configDir: config.configDir,
        concurrency: config.concurrency,
        tabWidth: cliOptions.tabWidth ?? config.tabWidth,
        ...(config.defaultSeverity !== undefined ? { defaultSeverity: config.defaultSeverity } : {}),
        verbose: cliOptions.verbose,
        outputFormat: cliOptions.output,
      });

      // Print global summary (only for line format)
      if (cliOptions.output === OutputFormat.Line) {
        printGlobalSummary(
          result.totalFiles,
          result.totalErrors,
          result.totalWarnings,
          result.failedFiles
        );
      }

      // Exit with appropriate code
      process.exit(result.hadOperationalErrors || result.hadSeverityErrors ? 1 : 0);
    });
}
