import type { Command } from 'commander';
import { parseRulesOptions } from '../boundaries/index';
import { RULES } from '../rules/descriptors';
import { printRules } from '../output/reporter';
import { error } from '../output/logger';
import { handleUnknownError } from '../errors/index';
import { OutputFormat } from './types';

/*
 * Registers the `rules` command, which lists the rule descriptors.
 */
export function registerRulesCommand(program: Command): void {
  program
    .command('rules')
    .description('List the available rules')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .action((options: unknown) => {
      let rulesOptions;
      try {
        rulesOptions = parseRulesOptions(options);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing rules options');
        error(err.message);
        process.exit(1);
      }

      if (rulesOptions.output === OutputFormat.Json) {
        console.log(JSON.stringify(RULES, null, 2));
        return;
      }
      printRules(RULES);
    });
}
