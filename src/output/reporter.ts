import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import path from 'path';
import { Severity, type RuleDescriptor } from '../rules/types';
import { log } from './logger';

function statusLabel(status: Severity): string {
  switch (status) {
    case Severity.ERROR:
      return chalk.red('error');
    case Severity.WARNING:
      return chalk.yellow('warning');
  }
}

export function printFileHeader(fileRelPath: string): void {
  const absPath = path.resolve(process.cwd(), fileRelPath);
  // OSC 8 hyperlink
  const link = `\u001B]8;;file://${absPath}\u0007${fileRelPath}\u001B]8;;\u0007`;
  log(chalk.underline(link));
}

/*
 * Prints one issue as aligned columns: location, severity, wrapped message, rule id.
 */
export function printIssueRow(
  loc: string,
  status: Severity,
  summary: string,
  ruleName: string,
  opts: { locWidth?: number; severityWidth?: number; messageWidth?: number } = {}
): void {
  const locWidth = opts.locWidth ?? 7;
  const severityWidth = opts.severityWidth ?? 8;

  // Keep the rule column on the first line when the terminal allows it
  const termCols = process.stdout.columns || 100;
  const prefixOverhead = locWidth + severityWidth + 4;
  const ruleColumnBuffer = 30;
  const messageWidth = opts.messageWidth ?? Math.max(40, termCols - prefixOverhead - ruleColumnBuffer);

  const locCell = loc.padEnd(locWidth, ' ');
  const colored = statusLabel(status);
  const pad = Math.max(0, severityWidth - stripAnsi(colored).length);
  const prefix = `  ${locCell} ${colored}${' '.repeat(pad)}  `;
  const prefixLen = stripAnsi(prefix).length;

  const lines: string[] = [];
  let current = '';
  for (const word of summary.split(/\s+/).filter(Boolean)) {
    if (current.length + (current ? 1 : 0) + word.length > messageWidth) {
      lines.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  lines.push(current);

  const [first = '', ...rest] = lines;
  log(`${prefix}${first.padEnd(messageWidth, ' ')}  ${chalk.dim(ruleName)}`);
  const contPrefix = ' '.repeat(prefixLen);
  for (const line of rest) {
    log(`${contPrefix}${line}`);
  }
}

export function printGlobalSummary(files: number, errors: number, warnings: number, failures: number = 0): void {
  const okMark = errors === 0 && failures === 0 ? chalk.green('✓') : chalk.red('✖');
  const errTxt = errors === 1 ? '1 error' : `${errors} errors`;
  const warnTxt = warnings === 1 ? '1 warning' : `${warnings} warnings`;
  const fileTxt = files === 1 ? '1 file' : `${files} files`;

  const coloredErr = errors > 0 ? chalk.red(errTxt) : chalk.green(errTxt);
  const coloredWarn = chalk.yellow(warnTxt);

  // "X errors and Y warnings in Z files."
  log(`${okMark} ${coloredErr} and ${coloredWarn} in ${fileTxt}.`);

  if (failures > 0) {
    const failTxt = failures === 1 ? '1 file could not be processed' : `${failures} files could not be processed`;
    log(chalk.red(`✖ ${failTxt}`));
  }
}

export function printRules(rules: readonly RuleDescriptor[]): void {
  const idWidth = Math.max(...rules.map((rule) => rule.id.length)) + 2;
  for (const rule of rules) {
    log(`  ${chalk.cyan(rule.id.padEnd(idWidth, ' '))}${statusLabel(rule.defaultSeverity)}  ${rule.message}`);
    log(`  ${' '.repeat(idWidth)}${chalk.dim(`${rule.category}: ${rule.title}`)}`);
  }
}
