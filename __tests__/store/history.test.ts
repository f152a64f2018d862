import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { HistoryStore, toSearchFilters } from '../../app/store/history.js';
import { quietLogger, tempDir } from '../support/fakes.js';

describe('HistoryStore', () => {
  let dir: string;
  let history: HistoryStore;

  beforeEach(() => {
    dir = tempDir();
    history = new HistoryStore(join(dir, 'history.jsonl'), quietLogger());
    history.add({
      timestamp: '2024-04-01T09:00:00.000Z',
      original_prompt: 'draw a cat',
      enhanced_prompt: 'A detailed illustration of a cat',
      provider: 'openai',
      model: 'gpt-4o-mini',
      tokens_used: 42,
    });
    history.add({
      timestamp: '2024-04-02T09:00:00.000Z',
      original_prompt: 'write a poem',
      enhanced_prompt: 'Compose a sonnet about autumn',
      provider: 'anthropic',
      model: 'claude-test',
      tokens_used: null,
    });
    history.add({
      timestamp: '2024-04-03T09:00:00.000Z',
      original_prompt: 'explain recursion',
      enhanced_prompt: 'Explain recursion to a new programmer, with a cat example',
      provider: 'openai',
      model: 'gpt-4o',
    });
  });

  it('lists newest first', () => {
    expect(history.list().map((e) => e.original_prompt)).toEqual([
      'explain recursion',
      'write a poem',
      'draw a cat',
    ]);
    expect(history.list(1)).toHaveLength(1);
    expect(history.count()).toBe(3);
  });

  it('gets entries by position', () => {
    expect(history.getEntry(0)?.original_prompt).toBe('explain recursion');
    expect(history.getEntry(2)?.tokens_used).toBe(42);
    expect(history.getEntry(3)).toBeNull();
    expect(history.getEntry(-1)).toBeNull();
  });

  it('searches both prompt fields', () => {
    expect(history.search({ query: 'cat' }).map((e) => e.original_prompt)).toEqual([
      'explain recursion',
      'draw a cat',
    ]);
  });

  it('filters by provider and model', () => {
    expect(history.search({ provider: 'openai' })).toHaveLength(2);
    expect(history.search({ provider: 'openai', model: 'gpt-4o' }).map((e) => e.original_prompt)).toEqual([
      'explain recursion',
    ]);
  });

  it('filters by time range', () => {
    const hits = history.search({ since: '2024-04-02T00:00:00Z', until: '2024-04-02T23:59:59Z' });
    expect(hits.map((e) => e.original_prompt)).toEqual(['write a poem']);
  });

  it('keeps unknown fields written by other versions', () => {
    writeFileSync(
      history.path,
      `${JSON.stringify({ timestamp: '2024-05-01T00:00:00.000Z', original_prompt: 'x', settings: { role: 'poet' } })}\n`,
    );
    expect(history.list()[0].settings).toEqual({ role: 'poet' });
  });

  it('skips a record whose fields have the wrong type', () => {
    writeFileSync(history.path, '{"original_prompt": 7}\n{"original_prompt": "ok"}\n');
    expect(history.list().map((e) => e.original_prompt)).toEqual(['ok']);
  });

  it('exports and clears', () => {
    const out = join(dir, 'export.json');
    expect(history.export(out)).toBe(3);
    expect(JSON.parse(readFileSync(out, 'utf-8'))).toHaveLength(3);

    expect(history.clear()).toBe(true);
    expect(history.count()).toBe(0);
  });
});

describe('toSearchFilters', () => {
  it('maps provider and model to exact-match filters', () => {
    expect(toSearchFilters({ query: 'q', provider: 'openai', since: '2024-01-01' })).toEqual({
      query: 'q',
      equals: { provider: 'openai', model: undefined },
      since: '2024-01-01',
      until: undefined,
    });
  });
});
