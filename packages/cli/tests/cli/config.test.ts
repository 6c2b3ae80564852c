/**
 * Configuration Loader Tests
 * Tests for .brewport.yaml loading and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from 'brewport';
import {
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  parseConfig,
  toTranspileOptions,
} from '../../src/config.js';

// ============================================================
// TEST FIXTURES
// ============================================================

let testDir = '';

function writeConfig(text: string): void {
  writeFileSync(join(testDir, '.brewport.yaml'), text, 'utf-8');
}

function configError(text: string): ConfigError {
  try {
    parseConfig(text);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'brewport-config-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

describe('createDefaultConfig', () => {
  it('returns the documented defaults', () => {
    expect(createDefaultConfig()).toEqual({
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
    });
  });
});

// ============================================================
// FILE LOOKUP
// ============================================================

describe('loadConfig', () => {
  it('returns null when the directory has no configuration file', () => {
    expect(loadConfig(testDir)).toBeNull();
  });

  it('returns defaults for an empty file', () => {
    writeConfig('');
    expect(loadConfig(testDir)).toEqual(createDefaultConfig());
  });

  it('merges values over the defaults', () => {
    writeConfig(
      [
        'preserveComments: true',
        'outDir: generated',
        'emit:',
        '  indent: 4',
        '  knownTypes: [Widget, Gadget]',
        '  header: Generated by brewport',
      ].join('\n')
    );
    const config = loadConfig(testDir);
    expect(config).toEqual({
      preserveComments: true,
      outDir: 'generated',
      extension: '.ts',
      emit: {
        indent: 4,
        nameSeparator: '$',
        nestedAliases: true,
        trustWildcardImports: true,
        knownTypes: ['Widget', 'Gadget'],
        knownInterfaces: [],
        header: 'Generated by brewport',
      },
    });
  });

  it('reports an invalid file found in the directory', () => {
    writeConfig('outDir: 3');
    expect(() => loadConfig(testDir)).toThrow(
      'Invalid configuration: outDir must be a string or null'
    );
  });
});

describe('loadConfigFile', () => {
  it('loads a file at any path', () => {
    const path = join(testDir, 'custom.yaml');
    writeFileSync(path, 'extension: .mts\n', 'utf-8');
    expect(loadConfigFile(path).extension).toBe('.mts');
  });

  it('rejects a missing file', () => {
    const path = join(testDir, 'missing.yaml');
    expect(() => loadConfigFile(path)).toThrow(
      `Invalid configuration: file not found: ${path}`
    );
  });
});

// ============================================================
// VALIDATION
// ============================================================

describe('parseConfig - invalid values', () => {
  it('rejects unknown top-level keys', () => {
    const error = configError('outdir: out');
    expect(error.errorId).toBe('BREW-C001');
    expect(error.message).toBe('Invalid configuration: unknown key outdir');
    expect(error.context).toEqual({ key: 'outdir', detail: 'unknown key outdir' });
  });

  it('rejects unknown emit keys', () => {
    expect(configError('emit:\n  tabs: true').message).toBe(
      'Invalid configuration: unknown key emit.tabs'
    );
  });

  it('rejects a non-mapping document', () => {
    expect(configError('- a\n- b').message).toBe(
      'Invalid configuration: configuration must be a mapping'
    );
  });

  it('rejects a non-mapping emit section', () => {
    expect(configError('emit: 2').message).toBe('Invalid configuration: emit must be a mapping');
  });

  it('rejects wrongly typed values', () => {
    expect(configError('preserveComments: yes please').message).toBe(
      'Invalid configuration: preserveComments must be a boolean'
    );
    expect(configError('emit:\n  indent: two').message).toBe(
      'Invalid configuration: emit.indent must be a non-negative integer'
    );
    expect(configError('emit:\n  indent: -2').message).toBe(
      'Invalid configuration: emit.indent must be a non-negative integer'
    );
    expect(configError('emit:\n  knownTypes: [A, 3]').message).toBe(
      'Invalid configuration: emit.knownTypes must be a list of strings'
    );
    expect(configError('emit:\n  nameSeparator: 1').message).toBe(
      'Invalid configuration: emit.nameSeparator must be a string'
    );
  });

  it('requires the extension to start with a dot', () => {
    expect(configError('extension: ts').message).toBe(
      'Invalid configuration: extension must start with a dot'
    );
  });

  it('reports malformed YAML', () => {
    const error = configError('emit: [unclosed');
    expect(error.message.startsWith('Invalid configuration: invalid YAML: ')).toBe(true);
  });
});

// ============================================================
// TRANSPILE OPTIONS
// ============================================================

describe('toTranspileOptions', () => {
  it('flattens emit settings and appends extra known types', () => {
    const config = parseConfig('emit:\n  knownTypes: [Widget]\n  nameSeparator: _');
    expect(toTranspileOptions(config, ['Shape'])).toEqual({
      preserveComments: false,
      indent: 2,
      nameSeparator: '_',
      nestedAliases: true,
      trustWildcardImports: true,
      knownTypes: ['Widget', 'Shape'],
      knownInterfaces: [],
      header: null,
    });
  });
});
