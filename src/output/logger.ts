/**
 * Console output for commentlint.
 *
 * Machine-readable formats (json, rdjson) switch on silent mode so that stdout
 * carries nothing but the JSON document. Errors are never silenced.
 */

const PREFIX = '[commentlint]';

let silentMode = false;
let verboseMode = false;

export function setSilentMode(silent: boolean): void {
  silentMode = silent;
}

/**
 * Enable per-file progress messages from debug().
 */
export function setVerboseMode(verbose: boolean): void {
  verboseMode = verbose;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
  if (!silentMode) {
    console.log(...args);
  }
}

/**
 * Prefixed warning on stderr. Silenced in silent mode.
 */
export function warn(message: string): void {
  if (!silentMode) {
    console.warn(`${PREFIX} Warning: ${message}`);
  }
}

/**
 * Prefixed progress message on stderr, only in verbose mode.
 * Goes to stderr so it can be used together with json output.
 */
export function debug(message: string): void {
  if (verboseMode) {
    console.error(`${PREFIX} ${message}`);
  }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(message: string): void {
  console.error(`Error: ${message}`);
}
