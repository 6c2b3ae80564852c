/**
 * CLI Shared Utilities
 * Error formatting and verbose event logging for the command-line driver
 */

import {
  BrewportError,
  VERSION,
  type ObservabilityCallbacks,
} from 'brewport';
import { enrichError } from './cli-error-enrichment.js';
import {
  formatError as formatEnrichedError,
  type FormatOptions,
} from './cli-error-formatter.js';

/**
 * Format error for stderr output
 *
 * Transpiler errors go through the enrichment pipeline, which adds a
 * source snippet when source is given. Other errors print their message.
 */
export function formatError(
  err: Error,
  source?: string,
  options?: Partial<FormatOptions>
): string {
  const formatOpts: FormatOptions = {
    format: options?.format ?? 'human',
    verbose: options?.verbose ?? false,
    file: options?.file,
  };

  if (err instanceof BrewportError) {
    return formatEnrichedError(enrichError(err, source ?? ''), formatOpts);
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 */
export function detectHelpVersionFlag(
  argv: readonly string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

/**
 * Observability callbacks that write one line per event.
 * Used by --verbose with console.error as the writer.
 */
export function createVerboseLogger(
  file: string,
  write: (line: string) => void
): ObservabilityCallbacks {
  return {
    onStageComplete: ({ stage, durationMs }) => {
      write(`[${file}] ${stage} completed in ${durationMs}ms`);
    },
    onMemberMatched: ({ matcher, className, location }) => {
      const owner = className !== null ? ` in ${className}` : '';
      write(`[${file}] ${matcher}${owner} at ${location.line}:${location.column}`);
    },
    onTypeHoisted: ({ name, kind, enclosing }) => {
      write(`[${file}] hoisted ${kind} ${name} from ${enclosing}`);
    },
  };
}

export { VERSION };
