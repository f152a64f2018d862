/**
 * Append Log
 *
 * Newline-delimited JSON record store. Records are only ever appended;
 * reads re-parse the whole file, skip lines that do not hold a valid
 * record and return newest first.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { InvalidTimestampError, errorMessage } from '../utils/errors.js';

export const logRecordSchema = z
  .object({
    timestamp: z.string().optional(),
  })
  .passthrough();

export type LogRecord = z.infer<typeof logRecordSchema>;

export type ExportFormat = 'array' | 'lines';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['array', 'lines'];

export interface SearchFilters {
  /** Case-insensitive substring over the log's text fields */
  query?: string;
  /** Exact match per categorical field; undefined values are ignored */
  equals?: Record<string, string | undefined>;
  /** Inclusive lower bound on the timestamp (any Date.parse-able text; anything else throws) */
  since?: string;
  /** Inclusive upper bound on the timestamp */
  until?: string;
}

export interface AppendLogOptions<T extends LogRecord> {
  /** Shape every line must satisfy; failing lines are skipped */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Fields searched by `query` */
  textFields?: string[];
  /** Fields accepted by `equals` */
  categoricalFields?: string[];
  logger?: Logger;
}

/**
 * Sort key of a timestamp: milliseconds since epoch, or -Infinity when the
 * text is missing or not a date.
 */
export function timestampValue(timestamp: unknown): number {
  if (typeof timestamp !== 'string' || !timestamp) {
    return Number.NEGATIVE_INFINITY;
  }
  const ms = Date.parse(timestamp);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

/**
 * Milliseconds of a `since`/`until` bound. Throws InvalidTimestampError
 * when the text is not a date.
 */
export function parseTimestampBound(text: string): number {
  const ms = Date.parse(text);
  if (Number.isNaN(ms)) {
    throw new InvalidTimestampError(text);
  }
  return ms;
}

/**
 * Newest first. Equal instants fall back to the raw text.
 */
export function compareNewestFirst(a: LogRecord, b: LogRecord): number {
  const diff = timestampValue(b.timestamp) - timestampValue(a.timestamp);
  if (diff !== 0 && !Number.isNaN(diff)) {
    return diff;
  }
  const ta = a.timestamp ?? '';
  const tb = b.timestamp ?? '';
  return ta === tb ? 0 : ta < tb ? 1 : -1;
}

export class AppendLog<T extends LogRecord> {
  readonly path: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly textFields: string[];
  private readonly categoricalFields: Set<string>;
  private readonly log: Logger;

  constructor(path: string, options: AppendLogOptions<T>) {
    this.path = path;
    this.schema = options.schema;
    this.textFields = options.textFields ?? [];
    this.categoricalFields = new Set(options.categoricalFields ?? []);
    this.log = options.logger ?? rootLogger.child('[log]');
  }

  /**
   * Append one record as one line. A missing timestamp is filled in; the
   * caller's object is left untouched. Returns false if the write failed.
   */
  append(record: T): boolean {
    const stored = { ...record, timestamp: record.timestamp || new Date().toISOString() };

    try {
      mkdirSync(dirname(this.path), { recursive: true });
      appendFileSync(this.path, `${JSON.stringify(stored)}\n`, 'utf-8');
      this.log.debug(`Appended record to ${this.path}`);
      return true;
    } catch (error) {
      this.log.error(`Failed to append to ${this.path}:`, error);
      return false;
    }
  }

  /**
   * Every valid record, newest first, optionally capped at `limit`
   */
  readAll(limit?: number): T[] {
    const records = this.parse().sort(compareNewestFirst);
    return limit !== undefined && limit > 0 ? records.slice(0, limit) : records;
  }

  /**
   * Records matching every supplied filter, newest first. Throws
   * InvalidTimestampError for a `since` or `until` that is not a date.
   */
  search(filters: SearchFilters = {}): T[] {
    const query = filters.query?.toLowerCase();
    const equals = Object.entries(filters.equals ?? {}).filter(
      (entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== '',
    );
    for (const [field] of equals) {
      if (!this.categoricalFields.has(field)) {
        this.log.warn(`Filtering on undeclared field '${field}'`);
      }
    }
    const since = filters.since ? parseTimestampBound(filters.since) : undefined;
    const until = filters.until ? parseTimestampBound(filters.until) : undefined;

    return this.readAll().filter((record) => {
      const fields: Record<string, unknown> = record;

      for (const [field, expected] of equals) {
        if (fields[field] !== expected) return false;
      }

      if (since !== undefined || until !== undefined) {
        const at = timestampValue(record.timestamp);
        if (at === Number.NEGATIVE_INFINITY) return false;
        if (since !== undefined && at < since) return false;
        if (until !== undefined && at > until) return false;
      }

      if (query) {
        const hit = this.textFields.some((field) => {
          const value = fields[field];
          return typeof value === 'string' && value.toLowerCase().includes(query);
        });
        if (!hit) return false;
      }

      return true;
    });
  }

  /**
   * Number of non-empty lines, without validating them
   */
  count(): number {
    const content = this.readRaw();
    if (content === null) return 0;
    return content.split('\n').filter((line) => line.trim()).length;
  }

  /**
   * Delete the backing file
   */
  clear(): boolean {
    try {
      rmSync(this.path, { force: true });
      this.log.info(`Cleared ${this.path}`);
      return true;
    } catch (error) {
      this.log.error(`Failed to clear ${this.path}:`, error);
      return false;
    }
  }

  /**
   * Write a full snapshot in `readAll()` order. Throws if the write fails.
   */
  export(outputPath: string, format: ExportFormat = 'array'): number {
    const records = this.readAll();
    const body =
      format === 'array'
        ? `${JSON.stringify(records, null, 2)}\n`
        : records.map((record) => `${JSON.stringify(record)}\n`).join('');

    try {
      mkdirSync(dirname(outputPath), { recursive: true });
      writeFileSync(outputPath, body, 'utf-8');
    } catch (error) {
      this.log.error(`Failed to export ${this.path}:`, error);
      throw error;
    }

    this.log.info(`Exported ${records.length} records to ${outputPath}`);
    return records.length;
  }

  private readRaw(): string | null {
    if (!existsSync(this.path)) {
      return null;
    }
    try {
      return readFileSync(this.path, 'utf-8');
    } catch (error) {
      this.log.error(`Failed to read ${this.path}: ${errorMessage(error)}`);
      return null;
    }
  }

  private parse(): T[] {
    const content = this.readRaw();
    if (content === null) {
      return [];
    }

    const records: T[] = [];
    for (const rawLine of content.split('\n')) {
      const line = rawLine.trim();
      if (!line) continue;

      const record = this.parseLine(line);
      if (record) {
        records.push(record);
      } else {
        this.log.warn(`Skipping invalid line in ${this.path}: ${line.slice(0, 50)}`);
      }
    }
    return records;
  }

  private parseLine(line: string): T | null {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      return null;
    }
    const parsed = this.schema.safeParse(value);
    return parsed.success ? parsed.data : null;
  }
}
