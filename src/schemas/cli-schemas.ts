import { z } from 'zod';
import { OutputFormat } from '../cli/types';

// CLI options schema for command line argument validation
export const CLI_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  output: z.nativeEnum(OutputFormat).default(OutputFormat.Line),
  config: z.string().optional(),
  tabWidth: z.coerce.number().int().positive().optional(),
});

// Rules command options schema
export const RULES_OPTIONS_SCHEMA = z.object({
  output: z.enum([OutputFormat.Line, OutputFormat.Json]).default(OutputFormat.Line),
});

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
export type RulesOptions = z.infer<typeof RULES_OPTIONS_SCHEMA>;
