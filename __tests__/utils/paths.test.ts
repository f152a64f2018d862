import { join } from 'path';
import { expandHome, isSafeFilename, isSafePath } from '../../app/utils/paths.js';

describe('isSafePath', () => {
  const base = join('/data', 'projects');

  it('accepts the base and anything beneath it', () => {
    expect(isSafePath(base, base)).toBe(true);
    expect(isSafePath(join(base, 'Poems', 'prompts.jsonl'), base)).toBe(true);
    expect(isSafePath(join(base, '..foo'), base)).toBe(true);
  });

  it('rejects escapes', () => {
    expect(isSafePath(join(base, '..'), base)).toBe(false);
    expect(isSafePath(join(base, '..', 'other'), base)).toBe(false);
    expect(isSafePath('/etc/passwd', base)).toBe(false);
  });
});

describe('isSafeFilename', () => {
  it('accepts plain names', () => {
    expect(isSafeFilename('My_Project')).toBe(true);
    expect(isSafeFilename('notes.v2')).toBe(true);
  });

  it('rejects separators, traversal, reserved and control characters', () => {
    for (const name of ['', '..', 'a/b', 'a\\b', 'a:b', 'a*b', 'a?b', 'a"b', 'a<b', 'a>b', 'a|b', 'a\0b', 'a\nb']) {
      expect(isSafeFilename(name)).toBe(false);
    }
  });
});

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~', '/home/u')).toBe('/home/u');
    expect(expandHome('~/cfg', '/home/u')).toBe('/home/u/cfg');
    expect(expandHome('/tmp/~x', '/home/u')).toBe('/tmp/~x');
  });
});
