import { jest } from '@jest/globals';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { program } from '../../app/cli.js';
import { InvalidTimestampError } from '../../app/utils/errors.js';
import { tempDir } from '../support/fakes.js';

describe('promptsmith CLI', () => {
  let configDir: string;
  let output: string[];

  beforeEach(() => {
    configDir = join(tempDir(), 'PromptSmith');
    output = [];
    jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
    process.exitCode = undefined;
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  const run = (...args: string[]) => program.parseAsync(['--config-dir', configDir, ...args], { from: 'user' });

  it('reports an empty history', async () => {
    await run('history', 'list');
    expect(output).toEqual(['No history entries found.']);
  });

  it('creates and lists a project', async () => {
    await run('project', 'create', 'Poems');
    expect(output).toEqual([`Created project: Poems (${join(configDir, 'projects', 'Poems')})`]);

    output.length = 0;
    await run('project', 'list');
    expect(output[0]).toBe('\nFound 1 projects:\n');
    expect(output[1]).toBe('  Poems');
    expect(output[2]).toMatch(/^ {4}Created: \d{4}-.* \| Prompts: 0$/);
  });

  it('sets a non-zero exit code for an unknown project', async () => {
    const errors = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await run('project', 'show', 'Missing');

    expect(process.exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith("Error: Project 'Missing' not found");
  });

  it('rejects a --since that is not a date', async () => {
    await expect(run('history', 'list', '--since', 'yesterday')).rejects.toThrow(InvalidTimestampError);
    expect(output).toEqual([]);
  });

  it('reports what the import command itself imported', async () => {
    const siblingDir = join(dirname(configDir), 'ImageAI');
    mkdirSync(siblingDir, { recursive: true });
    writeFileSync(join(siblingDir, 'config.json'), JSON.stringify({ gcloud_project_id: 'sibling-project' }));

    await run('import');
    expect(output).toEqual(['Imported settings']);

    output.length = 0;
    await run('import');
    expect(output).toEqual(['Nothing to import']);
  });
});
