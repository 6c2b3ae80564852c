/**
 * Configuration Loader
 * Reads and validates .brewport.yaml
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError, type TranspileOptions } from 'brewport';

// ============================================================
// TYPES
// ============================================================

export interface EmitConfig {
  readonly indent: number;
  readonly nameSeparator: string;
  readonly nestedAliases: boolean;
  readonly trustWildcardImports: boolean;
  readonly knownTypes: readonly string[];
  readonly knownInterfaces: readonly string[];
  readonly header: string | null;
}

export interface BrewportConfig {
  readonly preserveComments: boolean;
  /** Output directory; null writes next to each input */
  readonly outDir: string | null;
  /** Extension of written files, including the dot */
  readonly extension: string;
  readonly emit: EmitConfig;
}

export const CONFIG_FILE = '.brewport.yaml';

// ============================================================
// DEFAULTS
// ============================================================

export function createDefaultConfig(): BrewportConfig {
  return {
    preserveComments: false,
    outDir: null,
    extension: '.ts',
    emit: {
      indent: 2,
      nameSeparator: '$',
      nestedAliases: true,
      trustWildcardImports: true,
      knownTypes: [],
      knownInterfaces: [],
      header: null,
    },
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkKeys(
  record: Record<string, unknown>,
  allowed: readonly string[],
  prefix: string
): void {
  for (const key of Object.keys(record)) {
    if (!allowed.includes(key)) {
      throw new ConfigError(`unknown key ${prefix}${key}`, { key: `${prefix}${key}` });
    }
  }
}

function readBoolean(record: Record<string, unknown>, key: string, path: string, fallback: boolean): boolean {
  const value = record[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${path} must be a boolean`, { key: path });
  }
  return value;
}

function readString(record: Record<string, unknown>, key: string, path: string, fallback: string): string {
  const value = record[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new ConfigError(`${path} must be a string`, { key: path });
  }
  return value;
}

function readNullableString(
  record: Record<string, unknown>,
  key: string,
  path: string,
  fallback: string | null
): string | null {
  const value = record[key];
  if (value === undefined) return fallback;
  if (value === null || typeof value === 'string') return value;
  throw new ConfigError(`${path} must be a string or null`, { key: path });
}

function readStringList(
  record: Record<string, unknown>,
  key: string,
  path: string,
  fallback: readonly string[]
): readonly string[] {
  const value = record[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    throw new ConfigError(`${path} must be a list of strings`, { key: path });
  }
  const names: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ConfigError(`${path} must be a list of strings`, { key: path });
    }
    names.push(item);
  }
  return names;
}

function readIndent(record: Record<string, unknown>, fallback: number): number {
  const value = record['indent'];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError('emit.indent must be a non-negative integer', {
      key: 'emit.indent',
    });
  }
  return value;
}

function readEmit(value: unknown, defaults: EmitConfig): EmitConfig {
  if (value === undefined || value === null) return defaults;
  if (!isRecord(value)) {
    throw new ConfigError('emit must be a mapping', { key: 'emit' });
  }
  checkKeys(value, Object.keys(defaults), 'emit.');

  return {
    indent: readIndent(value, defaults.indent),
    nameSeparator: readString(value, 'nameSeparator', 'emit.nameSeparator', defaults.nameSeparator),
    nestedAliases: readBoolean(value, 'nestedAliases', 'emit.nestedAliases', defaults.nestedAliases),
    trustWildcardImports: readBoolean(
      value,
      'trustWildcardImports',
      'emit.trustWildcardImports',
      defaults.trustWildcardImports
    ),
    knownTypes: readStringList(value, 'knownTypes', 'emit.knownTypes', defaults.knownTypes),
    knownInterfaces: readStringList(
      value,
      'knownInterfaces',
      'emit.knownInterfaces',
      defaults.knownInterfaces
    ),
    header: readNullableString(value, 'header', 'emit.header', defaults.header),
  };
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * An empty document yields the defaults.
 *
 * @throws ConfigError for unknown keys and wrongly typed values
 */
export function validateConfig(raw: unknown): BrewportConfig {
  const defaults = createDefaultConfig();
  if (raw === null || raw === undefined) return defaults;
  if (!isRecord(raw)) {
    throw new ConfigError('configuration must be a mapping');
  }
  checkKeys(raw, Object.keys(defaults), '');

  const extension = readString(raw, 'extension', 'extension', defaults.extension);
  if (!extension.startsWith('.')) {
    throw new ConfigError('extension must start with a dot', { key: 'extension' });
  }

  return {
    preserveComments: readBoolean(raw, 'preserveComments', 'preserveComments', defaults.preserveComments),
    outDir: readNullableString(raw, 'outDir', 'outDir', defaults.outDir),
    extension,
    emit: readEmit(raw['emit'], defaults.emit),
  };
}

/**
 * Parse configuration text.
 *
 * @throws ConfigError for invalid YAML or invalid values
 */
export function parseConfig(text: string): BrewportConfig {
  let raw: unknown;
  try {
    raw = yaml.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid YAML: ${detail}`);
  }
  return validateConfig(raw);
}

// ============================================================
// LOADING
// ============================================================

/**
 * Load a configuration file given with --config.
 *
 * @throws ConfigError when the file is missing or invalid
 */
export function loadConfigFile(path: string): BrewportConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`file not found: ${path}`, { key: path });
  }
  return parseConfig(readFileSync(path, 'utf-8'));
}

/**
 * Load .brewport.yaml from a directory.
 *
 * @returns null when the directory has no configuration file
 * @throws ConfigError when the file is invalid
 */
export function loadConfig(dir: string): BrewportConfig | null {
  const path = join(dir, CONFIG_FILE);
  if (!existsSync(path)) return null;
  return parseConfig(readFileSync(path, 'utf-8'));
}

/** Transpile options for a configuration plus extra known types */
export function toTranspileOptions(
  config: BrewportConfig,
  extraKnownTypes: readonly string[] = []
): TranspileOptions {
  return {
    preserveComments: config.preserveComments,
    indent: config.emit.indent,
    nameSeparator: config.emit.nameSeparator,
    nestedAliases: config.emit.nestedAliases,
    trustWildcardImports: config.emit.trustWildcardImports,
    knownTypes: [...config.emit.knownTypes, ...extraKnownTypes],
    knownInterfaces: config.emit.knownInterfaces,
    header: config.emit.header,
  };
}
