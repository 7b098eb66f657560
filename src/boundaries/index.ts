export { loadConfig } from './config-loader';
export { parseCliOptions, parseRulesOptions } from './cli-parser';
export { FileSectionParser } from './file-section-parser';
export { ScanPathResolver, getSpecificityScore } from './scan-path-resolver';
export type { FilePatternConfig } from './file-section-parser';
export type { FileResolution } from './types';
