#!/usr/bin/env node
/**
 * CLI Transpile Entry Point
 *
 * Implements main(), parseArgs() and runTranspile() for the brewport binary.
 * Every input is parsed first so top-level types declared in one file
 * resolve in the others; each file is then transpiled on its own.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { BrewportError, parse, transpile, type TranspileOptions } from 'brewport';
import { explainError } from './cli-explain.js';
import { OUTPUT_FORMATS, type OutputFormat } from './cli-error-formatter.js';
import {
  createVerboseLogger,
  detectHelpVersionFlag,
  formatError,
  VERSION,
} from './cli-shared.js';
import {
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  toTranspileOptions,
  type BrewportConfig,
} from './config.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string }
  | ({ mode: 'transpile' } & TranspileArgs);

export interface TranspileArgs {
  files: string[];
  outDir: string | null;
  stdout: boolean;
  config: string | null;
  format: OutputFormat;
  verbose: boolean;
}

/** Where the driver reads configuration and writes text */
export interface CliIO {
  readonly cwd: string;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

const VALUE_FLAGS = ['--out-dir', '--config', '--format', '--explain'];
const BOOLEAN_FLAGS = ['--stdout', '--verbose', '--help', '-h', '--version', '-v'];

function isOutputFormat(value: string | undefined): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error for unknown options, missing values and missing inputs
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const helpOrVersion = detectHelpVersionFlag(argv);
  if (helpOrVersion) return helpOrVersion;

  const explainIndex = argv.indexOf('--explain');
  if (explainIndex !== -1) {
    const errorId = argv[explainIndex + 1];
    if (!errorId) {
      throw new Error('Missing error ID after --explain');
    }
    return { mode: 'explain', errorId };
  }

  const result: TranspileArgs = {
    files: [],
    outDir: null,
    stdout: false,
    config: null,
    format: 'human',
    verbose: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (VALUE_FLAGS.includes(arg)) {
      const value = argv[i + 1];
      i++;
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value after ${arg}`);
      }
      switch (arg) {
        case '--out-dir':
          result.outDir = value;
          break;
        case '--config':
          result.config = value;
          break;
        case '--format':
          if (!isOutputFormat(value)) {
            throw new Error(
              `Invalid --format value: ${value}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`
            );
          }
          result.format = value;
          break;
      }
      continue;
    }

    if (arg === '--stdout') {
      result.stdout = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg.startsWith('-') && !BOOLEAN_FLAGS.includes(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      result.files.push(arg);
    }
  }

  if (result.files.length === 0) {
    throw new Error('Missing file argument');
  }
  if (result.stdout && result.outDir !== null) {
    throw new Error('--stdout cannot be combined with --out-dir');
  }

  return { mode: 'transpile', ...result };
}

interface InputFile {
  readonly file: string;
  readonly source: string;
}

/** Top-level type names declared across all inputs that parse */
export function collectTypeNames(
  inputs: readonly InputFile[],
  options: TranspileOptions = {}
): string[] {
  const names = new Set<string>();
  for (const { source } of inputs) {
    try {
      for (const type of parse(source, { preserveComments: options.preserveComments }).types) {
        names.add(type.name);
      }
    } catch (error) {
      // The same failure is reported when the file is transpiled
      if (!(error instanceof BrewportError)) throw error;
    }
  }
  return [...names];
}

/** Output path for one input */
export function outputPathFor(
  file: string,
  config: BrewportConfig,
  outDir: string | null
): string {
  const { dir, name } = path.parse(file);
  const targetDir = outDir ?? config.outDir ?? dir;
  return path.join(targetDir, `${name}${config.extension}`);
}

function resolveConfig(args: TranspileArgs, io: CliIO): BrewportConfig {
  if (args.config !== null) {
    return loadConfigFile(path.resolve(io.cwd, args.config));
  }
  return loadConfig(io.cwd) ?? createDefaultConfig();
}

async function readInputs(
  args: TranspileArgs,
  io: CliIO
): Promise<{ inputs: InputFile[]; failed: number }> {
  const inputs: InputFile[] = [];
  let failed = 0;
  for (const file of args.files) {
    try {
      inputs.push({ file, source: await fs.readFile(path.resolve(io.cwd, file), 'utf-8') });
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      failed++;
      io.stderr(formatError(err, undefined, { format: args.format, file }));
    }
  }
  return { inputs, failed };
}

/**
 * Transpile every input file.
 *
 * @returns Exit code: 1 when any file failed, 0 otherwise
 * @throws ConfigError for an invalid configuration
 */
export async function runTranspile(args: TranspileArgs, io: CliIO): Promise<number> {
  const config = resolveConfig(args, io);
  const { inputs, failed: unreadable } = await readInputs(args, io);
  let failed = unreadable;

  const baseOptions = toTranspileOptions(config);
  const knownTypes = [
    ...(baseOptions.knownTypes ?? []),
    ...collectTypeNames(inputs, baseOptions),
  ];

  for (const { file, source } of inputs) {
    let output: string;
    try {
      output = transpile(source, {
        ...baseOptions,
        knownTypes,
        observability: args.verbose ? createVerboseLogger(file, io.stderr) : undefined,
      });
    } catch (error) {
      if (!(error instanceof BrewportError)) throw error;
      failed++;
      io.stderr(formatError(error, source, { format: args.format, verbose: args.verbose, file }));
      continue;
    }

    if (args.stdout) {
      io.stdout(output);
      continue;
    }

    const target = path.resolve(io.cwd, outputPathFor(file, config, args.outDir));
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, output, 'utf-8');
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      failed++;
      io.stderr(formatError(err, undefined, { format: args.format, file }));
      continue;
    }
    if (args.verbose) {
      io.stderr(`[${file}] wrote ${path.relative(io.cwd, target)}`);
    }
  }

  if (failed > 0) {
    io.stderr(`${failed} of ${args.files.length} file(s) failed`);
    return 1;
  }
  return 0;
}

const HELP_TEXT = `Usage:
  brewport [options] <file.java...>  Transpile source files to TypeScript
  brewport --help                    Show this help message
  brewport --version                 Show version information
  brewport --explain BREW-XXXX       Show error documentation

Options:
  --out-dir <dir>       Write output files to <dir> (default: next to each input)
  --stdout              Print output instead of writing files
  --config <path>       Configuration file (default: ./.brewport.yaml)
  --format <format>     Error format: human, json, compact (default: human)
  --verbose             Log pipeline events and error details

Examples:
  brewport src/Main.java
  brewport --out-dir out src/*.java
  brewport --format compact --stdout Shape.java
  brewport --explain BREW-E001`;

const consoleIO: CliIO = {
  cwd: process.cwd(),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/**
 * Entry point for the brewport binary
 *
 * Writes results to stdout and diagnostics to stderr.
 * Sets a non-zero exit code on any failure.
 */
export async function main(argv: string[] = process.argv.slice(2), io: CliIO = consoleIO): Promise<number> {
  let format: OutputFormat = 'human';

  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        io.stdout(HELP_TEXT);
        return 0;

      case 'version':
        io.stdout(VERSION);
        return 0;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          io.stderr(`Invalid error ID: ${parsed.errorId}`);
          io.stderr(
            'Error ID must be in format BREW-{L|G|P|I|E|C}{3-digit}, e.g., BREW-E001'
          );
          return 1;
        }
        io.stdout(documentation);
        return 0;
      }

      case 'transpile': {
        format = parsed.format;
        return await runTranspile(parsed, io);
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    io.stderr(formatError(error, undefined, { format }));
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
