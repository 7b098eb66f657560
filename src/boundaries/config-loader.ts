import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import {
  ALLOWED_EXTS,
  DEFAULT_CONCURRENCY,
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_TAB_WIDTH,
  LEGACY_CONFIG_FILENAME,
} from '../config/constants';
import { FileSectionParser } from './file-section-parser';

function isSupportedPattern(p: string): boolean {
  const last = p.split(/[\\/]/).pop() || p;
  if (last.endsWith('*')) return true;
  // Brace lists such as *.{ts,tsx}
  if (/\{[^}]*\}$/.test(last)) return true;
  return ALLOWED_EXTS.has(path.extname(last).toLowerCase());
}

function parsePositiveInt(key: string, val: string): number {
  const parsed = Number(val.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid ${key} value: ${val}`);
  }
  return parsed;
}

function findConfigFile(cwd: string, configPath?: string): string {
  if (configPath) {
    const explicit = path.resolve(cwd, configPath);
    if (!existsSync(explicit)) {
      throw new ConfigError(`Missing configuration file at ${explicit}`);
    }
    return explicit;
  }

  for (const name of [DEFAULT_CONFIG_FILENAME, LEGACY_CONFIG_FILENAME]) {
    const candidate = path.resolve(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  throw new ConfigError(
    `Missing configuration file: neither ${DEFAULT_CONFIG_FILENAME} nor ${LEGACY_CONFIG_FILENAME} found in ${cwd}`
  );
}

enum ConfigKey {
  TAB_WIDTH = 'TabWidth',
  CONCURRENCY = 'Concurrency',
  DEFAULT_SEVERITY = 'DefaultSeverity',
}

/**
 * Load and validate configuration from .commentlint.ini
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = findConfigFile(cwd, configPath);
  const configDir = path.dirname(iniPath);

  let tabWidthRaw: number | undefined;
  let concurrencyRaw: number | undefined;
  let defaultSeverityRaw: string | undefined;
  const rawConfigObj: Record<string, Record<string, string>> = {};

  try {
    const raw = readFileSync(iniPath, 'utf-8');
    let currentSection: string | null = null;

    for (const rawLine of raw.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#') || line.startsWith(';')) continue;

      // Section header
      const sectionMatch = line.match(/^\[(.*)\]$/);
      if (sectionMatch && sectionMatch[1]) {
        currentSection = sectionMatch[1];
        rawConfigObj[currentSection] ??= {};
        continue;
      }

      const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
      if (!m || !m[1]) continue;

      const key = m[1];
      const val = (m[2] || '').replace(/^"|"$/g, '').replace(/^'|'$/g, '');

      if (currentSection) {
        const section = rawConfigObj[currentSection];
        if (section) section[key] = val;
        continue;
      }

      switch (key) {
        case ConfigKey.TAB_WIDTH:
          tabWidthRaw = parsePositiveInt(key, val);
          break;
        case ConfigKey.CONCURRENCY:
          concurrencyRaw = parsePositiveInt(key, val);
          break;
        case ConfigKey.DEFAULT_SEVERITY:
          defaultSeverityRaw = val.trim().toLowerCase();
          break;
        default:
          throw new ConfigError(`Unknown global key "${key}" in ${iniPath}`);
      }
    }
  } catch (e: unknown) {
    if (e instanceof ConfigError) throw e;
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  const scanPaths = new FileSectionParser().parseSections(rawConfigObj);

  if (scanPaths.length === 0) {
    throw new ConfigError('At least one [pattern] section is required in config file');
  }

  for (const section of scanPaths) {
    if (!isSupportedPattern(section.pattern)) {
      throw new ConfigError(
        `Only ${Array.from(ALLOWED_EXTS).join(', ')} files can be linted. Invalid pattern: ${section.pattern}`
      );
    }
  }

  const configData = {
    configDir,
    tabWidth: tabWidthRaw ?? DEFAULT_TAB_WIDTH,
    concurrency: concurrencyRaw ?? DEFAULT_CONCURRENCY,
    defaultSeverity: defaultSeverityRaw,
    scanPaths,
  };

  const result = CONFIG_SCHEMA.safeParse(configData);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
