import type { z } from 'zod';
import { CLI_OPTIONS_SCHEMA, RULES_OPTIONS_SCHEMA, type CliOptions, type RulesOptions } from '../schemas/cli-schemas';
import { ValidationError } from '../errors/index';

/*
 * Validates raw Commander options against a schema. Every zod issue is
 * reported as `path: message` under one ValidationError.
 */
export function parseOptions<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  label: string
): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${label}: ${details}`);
  }
  return result.data;
}

export const parseCliOptions = (raw: unknown): CliOptions => parseOptions(CLI_OPTIONS_SCHEMA, raw, 'CLI options');

export const parseRulesOptions = (raw: unknown): RulesOptions => parseOptions(RULES_OPTIONS_SCHEMA, raw, 'rules options');
