import { Command } from 'commander';
import { getPackageVersion } from '../config/version';
import { registerMainCommand } from './commands';
import { registerRulesCommand } from './rules-command';

/*
 * Builds the commentlint program. Options are positional, so `--output`
 * after `rules` belongs to the subcommand rather than the lint command.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('commentlint')
    .description('Checks comment conventions in TypeScript and JavaScript sources')
    .version(getPackageVersion())
    .enablePositionalOptions();

  registerRulesCommand(program);
  registerMainCommand(program);
  return program;
}
