import { z } from 'zod';
import { RULE_OFF, RuleId, Severity } from '../rules/types';

export const RULE_SETTING_SCHEMA = z.union([z.nativeEnum(Severity), z.literal(RULE_OFF)]);

// One [pattern] section of the config file
export const FILE_PATTERN_SCHEMA = z.object({
  pattern: z.string().min(1),
  runRules: z.array(z.nativeEnum(RuleId)).optional(),
  severities: z.record(z.nativeEnum(RuleId), RULE_SETTING_SCHEMA),
});

// Configuration file schema for .commentlint.ini validation
export const CONFIG_SCHEMA = z.object({
  configDir: z.string().min(1),
  tabWidth: z.number().int().positive().default(4),
  concurrency: z.number().int().positive().default(4),
  defaultSeverity: z.nativeEnum(Severity).optional(),
  scanPaths: z.array(FILE_PATTERN_SCHEMA).min(1),
});

// Inferred types
export type FilePatternConfig = z.infer<typeof FILE_PATTERN_SCHEMA>;
export type Config = z.infer<typeof CONFIG_SCHEMA>;
