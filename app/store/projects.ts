/**
 * Project collections
 *
 * Each project is a directory under the projects root named after the
 * project's slug, holding:
 *   project.json   metadata, rewritten wholesale on every change
 *   prompts.jsonl  append-only prompt log (history records + `project`)
 *
 * Slugs keep their case, but two slugs that differ only in case are the
 * same project: creation is refused and lookups fall back to a
 * case-insensitive match.
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';
import type { AppendLog, ExportFormat } from './append-log.js';
import { createPromptLog, toSearchFilters, type HistoryQuery, type HistoryRecord } from './history.js';
import { ProjectExistsError, PromptsmithError, UnsafePathError, errorMessage } from '../utils/errors.js';
import { isSafeFilename, isSafePath } from '../utils/paths.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export const METADATA_FILE = 'project.json';
export const PROMPTS_FILE = 'prompts.jsonl';

export const projectMetadataSchema = z
  .object({
    name: z.string(),
    created: z.string().default(''),
    description: z.string().default(''),
    tags: z.array(z.string()).default([]),
  })
  .passthrough();

export type ProjectMetadata = z.infer<typeof projectMetadataSchema>;

export type ProjectSummary = ProjectMetadata & {
  slug: string;
  promptCount: number;
};

export interface CreateProjectOptions {
  description?: string;
  tags?: string[];
}

/**
 * Filesystem-safe directory name: letters, digits, `-` and `_` are kept,
 * every other character becomes `_`.
 */
export function slugify(name: string): string {
  let slug = '';
  for (const ch of name) {
    slug += /^[\p{L}\p{N}_-]$/u.test(ch) ? ch : '_';
  }
  return slug;
}

function normalizeTags(tags: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed) unique.add(trimmed);
  }
  return [...unique].sort();
}

export class Project {
  readonly slug: string;
  readonly dir: string;
  private meta: ProjectMetadata;
  private readonly entries: AppendLog<HistoryRecord>;
  private readonly log: Logger;

  constructor(slug: string, dir: string, metadata: ProjectMetadata, log: Logger) {
    this.slug = slug;
    this.dir = dir;
    this.meta = metadata;
    this.log = log;
    this.entries = createPromptLog(join(dir, PROMPTS_FILE), log);
  }

  get name(): string {
    return this.meta.name;
  }

  get metadata(): ProjectMetadata {
    return { ...this.meta, tags: [...this.meta.tags] };
  }

  get metadataPath(): string {
    return join(this.dir, METADATA_FILE);
  }

  get promptsPath(): string {
    return this.entries.path;
  }

  setDescription(description: string): boolean {
    return this.updateMetadata({ description });
  }

  addTags(...tags: string[]): boolean {
    return this.updateMetadata({ tags: normalizeTags([...this.meta.tags, ...tags]) });
  }

  removeTags(...tags: string[]): boolean {
    const removed = new Set(tags.map((tag) => tag.trim()));
    return this.updateMetadata({ tags: this.meta.tags.filter((tag) => !removed.has(tag)) });
  }

  /**
   * Append a prompt record, tagged with this project's name
   */
  addPrompt(record: HistoryRecord): boolean {
    const ok = this.entries.append({ ...record, project: this.name });
    if (ok) {
      this.log.info(`Added prompt to project: ${this.name}`);
    }
    return ok;
  }

  prompts(limit?: number): HistoryRecord[] {
    return this.entries.readAll(limit);
  }

  search(query: HistoryQuery = {}): HistoryRecord[] {
    return this.entries.search(toSearchFilters(query));
  }

  promptCount(): number {
    return this.entries.count();
  }

  /**
   * Write `{metadata, prompts}` as one JSON document
   */
  export(outputPath: string): number {
    const prompts = this.prompts();
    try {
      mkdirSync(dirname(outputPath), { recursive: true });
      writeFileSync(
        outputPath,
        `${JSON.stringify({ metadata: this.metadata, prompts }, null, 2)}\n`,
        'utf-8',
      );
    } catch (error) {
      this.log.error('Failed to export project:', error);
      throw error;
    }
    this.log.info(`Exported project to ${outputPath}`);
    return prompts.length;
  }

  exportPrompts(outputPath: string, format: ExportFormat = 'array'): number {
    return this.entries.export(outputPath, format);
  }

  /**
   * Write metadata to disk. Returns false if the write failed.
   */
  saveMetadata(): boolean {
    try {
      mkdirSync(this.dir, { recursive: true });
      writeFileSync(this.metadataPath, `${JSON.stringify(this.meta, null, 2)}\n`, 'utf-8');
      return true;
    } catch (error) {
      this.log.error(`Failed to save project metadata: ${errorMessage(error)}`);
      return false;
    }
  }

  private updateMetadata(patch: Partial<ProjectMetadata>): boolean {
    this.meta = { ...this.meta, ...patch };
    return this.saveMetadata();
  }
}

export class ProjectStore {
  readonly projectsDir: string;
  private readonly log: Logger;

  constructor(projectsDir: string, log: Logger = rootLogger.child('[projects]')) {
    this.projectsDir = projectsDir;
    this.log = log;
  }

  /**
   * Create a project. Throws ProjectExistsError when a project with the
   * same slug (ignoring case) already exists, and removes the directory
   * again if its metadata cannot be written.
   */
  create(name: string, options: CreateProjectOptions = {}): Project {
    const slug = this.slugFor(name);

    const existing = this.findSlug(slug);
    if (existing !== null) {
      throw new ProjectExistsError(name, existing);
    }

    const dir = join(this.projectsDir, slug);
    mkdirSync(dir, { recursive: true });

    const project = new Project(
      slug,
      dir,
      {
        name,
        created: new Date().toISOString(),
        description: options.description ?? '',
        tags: normalizeTags(options.tags ?? []),
      },
      this.log,
    );
    if (!project.saveMetadata()) {
      rmSync(dir, { recursive: true, force: true });
      throw new PromptsmithError(`Failed to write metadata for project '${name}'`, 'PROJECT_CREATE_FAILED');
    }

    this.log.info(`Created project: ${name}`);
    return project;
  }

  /**
   * Open an existing project, or null if there is none
   */
  get(name: string): Project | null {
    const slug = this.findSlug(this.slugFor(name));
    if (slug === null) {
      return null;
    }

    const dir = join(this.projectsDir, slug);
    return new Project(slug, dir, this.readMetadata(dir, name), this.log);
  }

  /**
   * Open a project, creating it on first use
   */
  getOrCreate(name: string): Project {
    return this.get(name) ?? this.create(name);
  }

  /**
   * Every project with readable metadata, most recently created first
   */
  list(): ProjectSummary[] {
    const summaries: ProjectSummary[] = [];

    for (const slug of this.listSlugs()) {
      const dir = join(this.projectsDir, slug);
      const metadataPath = join(dir, METADATA_FILE);
      if (!existsSync(metadataPath)) continue;

      const metadata = this.parseMetadata(metadataPath);
      if (!metadata) continue;

      const project = new Project(slug, dir, metadata, this.log);
      summaries.push({ ...metadata, slug, promptCount: project.promptCount() });
    }

    return summaries.sort((a, b) => (a.created === b.created ? 0 : a.created < b.created ? 1 : -1));
  }

  /**
   * Remove a project directory and everything in it
   */
  delete(name: string): boolean {
    const project = this.get(name);
    if (!project) {
      return false;
    }

    try {
      rmSync(project.dir, { recursive: true, force: true });
      this.log.info(`Deleted project: ${project.name}`);
      return true;
    } catch (error) {
      this.log.error('Failed to delete project:', error);
      return false;
    }
  }

  private slugFor(name: string): string {
    const slug = slugify(name);
    if (!slug) {
      throw new PromptsmithError('Project name must not be empty', 'INVALID_PROJECT_NAME');
    }
    if (!isSafeFilename(slug) || !isSafePath(join(this.projectsDir, slug), this.projectsDir)) {
      throw new UnsafePathError(join(this.projectsDir, slug));
    }
    return slug;
  }

  private listSlugs(): string[] {
    if (!existsSync(this.projectsDir)) {
      return [];
    }
    try {
      return readdirSync(this.projectsDir, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name);
    } catch (error) {
      this.log.error(`Failed to list ${this.projectsDir}: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Directory name holding `slug`: exact match first, then ignoring case
   */
  private findSlug(slug: string): string | null {
    const slugs = this.listSlugs();
    if (slugs.includes(slug)) {
      return slug;
    }
    const folded = slug.toLowerCase();
    return slugs.find((candidate) => candidate.toLowerCase() === folded) ?? null;
  }

  private parseMetadata(path: string): ProjectMetadata | null {
    try {
      const parsed = projectMetadataSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
      if (parsed.success) {
        return parsed.data;
      }
      this.log.warn(`Invalid project metadata at ${path}`);
    } catch (error) {
      this.log.warn(`Unreadable project metadata at ${path}: ${errorMessage(error)}`);
    }
    return null;
  }

  private readMetadata(dir: string, fallbackName: string): ProjectMetadata {
    const path = join(dir, METADATA_FILE);
    const metadata = existsSync(path) ? this.parseMetadata(path) : null;
    return metadata ?? { name: fallbackName, created: new Date().toISOString(), description: '', tags: [] };
  }
}
