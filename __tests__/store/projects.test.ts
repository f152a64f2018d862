import { jest } from '@jest/globals';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { Project, ProjectStore, slugify } from '../../app/store/projects.js';
import { ProjectExistsError, PromptsmithError } from '../../app/utils/errors.js';
import { quietLogger, tempDir } from '../support/fakes.js';

describe('slugify', () => {
  it('keeps letters, digits, dashes and underscores', () => {
    expect(slugify('My Project')).toBe('My_Project');
    expect(slugify('cafe-2024_v1')).toBe('cafe-2024_v1');
    expect(slugify('Résumé ideas')).toBe('Résumé_ideas');
  });

  it('replaces path characters', () => {
    expect(slugify('../etc/passwd')).toBe('___etc_passwd');
    expect(slugify('a:b*c?')).toBe('a_b_c_');
  });
});

describe('ProjectStore', () => {
  let root: string;
  let store: ProjectStore;

  beforeEach(() => {
    root = join(tempDir(), 'projects');
    store = new ProjectStore(root, quietLogger());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('removes the directory when metadata cannot be written', () => {
    jest.spyOn(Project.prototype, 'saveMetadata').mockReturnValue(false);

    expect(() => store.create('Broken')).toThrow(PromptsmithError);
    expect(existsSync(join(root, 'Broken'))).toBe(false);
    expect(store.get('Broken')).toBeNull();
  });

  it('creates a project directory with metadata', () => {
    const project = store.create('My Project', { description: 'Ideas', tags: ['b', 'a', 'b', ' '] });

    expect(project.slug).toBe('My_Project');
    expect(project.dir).toBe(join(root, 'My_Project'));
    const metadata = JSON.parse(readFileSync(join(root, 'My_Project', 'project.json'), 'utf-8'));
    expect(metadata.name).toBe('My Project');
    expect(metadata.description).toBe('Ideas');
    expect(metadata.tags).toEqual(['a', 'b']);
    expect(typeof metadata.created).toBe('string');
  });

  it('refuses a second project whose slug differs only in case', () => {
    store.create('My Project');

    expect(() => store.create('my project')).toThrow(ProjectExistsError);
    expect(() => store.create('My_Project')).toThrow(ProjectExistsError);
  });

  it('rejects names that slug to nothing', () => {
    expect(() => store.create('')).toThrow(PromptsmithError);
  });

  it('finds projects ignoring case', () => {
    store.create('My Project');

    expect(store.get('my project')?.name).toBe('My Project');
    expect(store.get('Other')).toBeNull();
  });

  it('reuses an existing project in getOrCreate', () => {
    const first = store.getOrCreate('Notes');
    const second = store.getOrCreate('notes');
    expect(second.dir).toBe(first.dir);
  });

  it('stores prompts tagged with the project name', () => {
    const project = store.create('Poems');
    project.addPrompt({ timestamp: '2024-01-01T00:00:00.000Z', original_prompt: 'a', enhanced_prompt: 'b' });
    project.addPrompt({ timestamp: '2024-01-02T00:00:00.000Z', original_prompt: 'c', enhanced_prompt: 'd' });

    const reopened = store.get('Poems');
    expect(reopened?.promptCount()).toBe(2);
    expect(reopened?.prompts().map((p) => [p.original_prompt, p.project])).toEqual([
      ['c', 'Poems'],
      ['a', 'Poems'],
    ]);
    expect(reopened?.search({ query: 'D' }).map((p) => p.original_prompt)).toEqual(['c']);
  });

  it('edits description and tags', () => {
    const project = store.create('Tagged', { tags: ['x'] });

    expect(project.setDescription('New text')).toBe(true);
    expect(project.addTags('z', 'y', 'x')).toBe(true);
    expect(project.removeTags('x')).toBe(true);

    const metadata = store.get('Tagged')?.metadata;
    expect(metadata?.description).toBe('New text');
    expect(metadata?.tags).toEqual(['y', 'z']);
  });

  it('lists projects newest first and skips directories without metadata', () => {
    for (const [slug, created] of [
      ['Old', '2023-01-01T00:00:00.000Z'],
      ['New', '2024-01-01T00:00:00.000Z'],
    ]) {
      mkdirSync(join(root, slug), { recursive: true });
      writeFileSync(join(root, slug, 'project.json'), JSON.stringify({ name: slug, created }));
    }
    mkdirSync(join(root, 'stray'));
    mkdirSync(join(root, 'broken'));
    writeFileSync(join(root, 'broken', 'project.json'), '{nope');

    const summaries = store.list();
    expect(summaries.map((s) => [s.slug, s.promptCount])).toEqual([
      ['New', 0],
      ['Old', 0],
    ]);
    expect(summaries[0].tags).toEqual([]);
  });

  it('exports metadata and prompts together', () => {
    const project = store.create('Export Me', { description: 'd' });
    project.addPrompt({ timestamp: '2024-01-01T00:00:00.000Z', original_prompt: 'a' });
    const out = join(root, '..', 'export.json');

    expect(project.export(out)).toBe(1);
    const document = JSON.parse(readFileSync(out, 'utf-8'));
    expect(document.metadata.name).toBe('Export Me');
    expect(document.prompts).toEqual([
      { timestamp: '2024-01-01T00:00:00.000Z', original_prompt: 'a', project: 'Export Me' },
    ]);
  });

  it('deletes a project', () => {
    const project = store.create('Gone');
    expect(store.delete('gone')).toBe(true);
    expect(existsSync(project.dir)).toBe(false);
    expect(store.delete('gone')).toBe(false);
  });
});
