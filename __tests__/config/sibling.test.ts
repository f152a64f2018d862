import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { findSiblingConfig, hasImportableData, siblingConfigCandidates } from '../../app/config/sibling.js';
import { quietLogger, tempDir } from '../support/fakes.js';

describe('sibling config discovery', () => {
  let base: string;
  let configDir: string;

  beforeEach(() => {
    base = tempDir();
    configDir = join(base, 'PromptSmith');
  });

  it('looks beside our own config directory', () => {
    expect(siblingConfigCandidates({ configDir, isWsl: false })).toEqual([join(base, 'ImageAI', 'config.json')]);
  });

  it('adds each Windows profile under WSL', () => {
    const users = join(base, 'Users');
    mkdirSync(join(users, 'alex'), { recursive: true });

    expect(siblingConfigCandidates({ configDir, isWsl: true, windowsUsersDir: users, logger: quietLogger() })).toEqual([
      join(base, 'ImageAI', 'config.json'),
      join(users, 'alex', 'AppData', 'Roaming', 'ImageAI', 'config.json'),
    ]);
  });

  it('returns the first document with importable data', () => {
    mkdirSync(join(base, 'ImageAI'));
    const path = join(base, 'ImageAI', 'config.json');
    writeFileSync(path, JSON.stringify({ gcloud_project_id: 'test-project' }));

    expect(findSiblingConfig({ configDir, isWsl: false, logger: quietLogger() })).toEqual({
      path,
      document: { gcloud_project_id: 'test-project' },
    });
  });

  it('skips empty or unreadable documents', () => {
    mkdirSync(join(base, 'ImageAI'));
    const path = join(base, 'ImageAI', 'config.json');

    writeFileSync(path, JSON.stringify({ providers: {} }));
    expect(findSiblingConfig({ configDir, isWsl: false, logger: quietLogger() })).toBeNull();

    writeFileSync(path, '{broken');
    expect(findSiblingConfig({ configDir, isWsl: false, logger: quietLogger() })).toBeNull();
  });

  it('recognises importable data', () => {
    expect(hasImportableData({ providers: { openai: {} } })).toBe(true);
    expect(hasImportableData({ auth_mode: 'api_key' })).toBe(true);
    expect(hasImportableData({ providers: {}, theme: 'dark' })).toBe(false);
  });
});
