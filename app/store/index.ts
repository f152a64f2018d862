export { AppendLog, EXPORT_FORMATS, compareNewestFirst, logRecordSchema, timestampValue } from './append-log.js';
export type { AppendLogOptions, ExportFormat, LogRecord, SearchFilters } from './append-log.js';
export { HistoryStore, createPromptLog, historyRecordSchema } from './history.js';
export type { HistoryQuery, HistoryRecord } from './history.js';
export { Project, ProjectStore, projectMetadataSchema, slugify } from './projects.js';
export type { CreateProjectOptions, ProjectMetadata, ProjectSummary } from './projects.js';
