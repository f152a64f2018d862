import type { Command } from 'commander';
import { homedir } from 'os';
import { createAppContext, type AppContext, type AppContextOptions } from '../context.js';
import { parseTimestampBound } from '../store/append-log.js';
import { errorMessage } from '../utils/errors.js';
import { expandHome } from '../utils/paths.js';
import type { HistoryRecord } from '../store/history.js';

export interface GlobalOptions {
  configDir?: string;
  verbose?: boolean;
}

/**
 * Build the application context from the program-level options.
 * `overrides` lets a command opt out of parts of startup.
 */
export function contextFor(
  command: Command,
  overrides: Pick<AppContextOptions, 'importSibling'> = {},
): Promise<AppContext> {
  const { configDir, verbose } = command.optsWithGlobals<GlobalOptions>();
  return createAppContext({
    configDir: configDir ? expandHome(configDir, homedir()) : undefined,
    logLevel: verbose ? 'debug' : 'warn',
    ...overrides,
  });
}

/**
 * Report a failed command: one line on stderr and a non-zero exit code
 */
export function fail(error: unknown): void {
  console.error(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
}

/**
 * First `length` characters of a prompt on one line
 */
export function preview(text: unknown, length = 60): string {
  const flat = typeof text === 'string' ? text.replace(/\s*\n\s*/g, ' ') : '';
  return flat.length > length ? `${flat.slice(0, length)}...` : flat;
}

export function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Expected a non-negative integer, got '${value}'`);
  }
  return n;
}

/**
 * Option parser for `--since`/`--until`: the text unchanged, once it is known to be a date
 */
export function parseTimestamp(value: string): string {
  parseTimestampBound(value);
  return value;
}

export function printEntryLine(index: number, entry: HistoryRecord): void {
  const source = [entry.provider, entry.model].filter(Boolean).join('/') || 'unknown';
  console.log(`[${index}] ${entry.timestamp || 'Unknown'} - ${source}`);
  console.log(`    ${preview(entry.original_prompt)}`);
  console.log('');
}
