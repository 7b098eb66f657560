/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.commentlint.ini';
export const LEGACY_CONFIG_FILENAME = 'commentlint.ini';
export const ALLOWED_EXTS = new Set(['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs']);
export const DECLARATION_FILE = /\.d\.[cm]?ts$/i;
export const DEFAULT_TAB_WIDTH = 4;
export const DEFAULT_CONCURRENCY = 4;
