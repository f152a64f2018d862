/**
 * Enhancement history: one global JSONL log in the config directory.
 */

import { z } from 'zod';
import { AppendLog, logRecordSchema, type ExportFormat, type SearchFilters } from './append-log.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export const historyRecordSchema = logRecordSchema
  .extend({
    original_prompt: z.string().optional(),
    enhanced_prompt: z.string().optional(),
    provider: z.string().optional(),
    model: z.string().optional(),
    tokens_used: z.number().nullable().optional(),
    duration_seconds: z.number().optional(),
    project: z.string().optional(),
  })
  .passthrough();

export type HistoryRecord = z.infer<typeof historyRecordSchema>;

export const HISTORY_TEXT_FIELDS = ['original_prompt', 'enhanced_prompt'];
export const HISTORY_CATEGORICAL_FIELDS = ['provider', 'model'];

export interface HistoryQuery {
  query?: string;
  provider?: string;
  model?: string;
  /** Inclusive, ISO-8601 */
  since?: string;
  /** Inclusive, ISO-8601 */
  until?: string;
}

/**
 * Build the log used for history and project prompt files alike
 */
export function createPromptLog(path: string, log: Logger): AppendLog<HistoryRecord> {
  return new AppendLog(path, {
    schema: historyRecordSchema,
    textFields: HISTORY_TEXT_FIELDS,
    categoricalFields: HISTORY_CATEGORICAL_FIELDS,
    logger: log,
  });
}

/**
 * Translate the history filter shape into AppendLog filters
 */
export function toSearchFilters(query: HistoryQuery): SearchFilters {
  return {
    query: query.query,
    equals: { provider: query.provider, model: query.model },
    since: query.since,
    until: query.until,
  };
}

export class HistoryStore {
  private readonly entries: AppendLog<HistoryRecord>;
  private readonly log: Logger;

  constructor(path: string, log: Logger = rootLogger.child('[history]')) {
    this.log = log;
    this.entries = createPromptLog(path, log);
  }

  get path(): string {
    return this.entries.path;
  }

  add(entry: HistoryRecord): boolean {
    const ok = this.entries.append(entry);
    if (ok) {
      this.log.info('Added entry to history');
    }
    return ok;
  }

  /**
   * Newest first
   */
  list(limit?: number): HistoryRecord[] {
    return this.entries.readAll(limit);
  }

  search(query: HistoryQuery = {}): HistoryRecord[] {
    return this.entries.search(toSearchFilters(query));
  }

  /**
   * Entry by position, 0 being the most recent
   */
  getEntry(index: number): HistoryRecord | null {
    if (!Number.isInteger(index) || index < 0) {
      return null;
    }
    return this.entries.readAll()[index] ?? null;
  }

  count(): number {
    return this.entries.count();
  }

  clear(): boolean {
    return this.entries.clear();
  }

  export(outputPath: string, format: ExportFormat = 'array'): number {
    return this.entries.export(outputPath, format);
  }
}
