import { Command, Option } from 'commander';
import { confirm } from '@inquirer/prompts';
import { resolve } from 'path';
import { EXPORT_FORMATS, type ExportFormat } from '../store/append-log.js';
import { contextFor, fail, parseCount, parseTimestamp, printEntryLine } from './shared.js';

interface ListOptions {
  limit?: number;
  query?: string;
  provider?: string;
  model?: string;
  since?: string;
  until?: string;
}

interface ExportOptions {
  format: ExportFormat;
}

interface ClearOptions {
  yes?: boolean;
}

const RULE = '='.repeat(80);

export const historyCommand = new Command('history').description('Browse and manage enhancement history');

historyCommand
  .command('list')
  .description('List history entries, newest first')
  .option('-l, --limit <number>', 'Maximum number of entries', parseCount)
  .option('-q, --query <text>', 'Search original and enhanced prompts')
  .option('-p, --provider <provider>', 'Filter by provider')
  .option('-m, --model <model>', 'Filter by model')
  .option('--since <date>', 'Only entries at or after this ISO-8601 time', parseTimestamp)
  .option('--until <date>', 'Only entries at or before this ISO-8601 time', parseTimestamp)
  .action(async (options: ListOptions, command: Command) => {
    try {
      const { history } = await contextFor(command);
      let entries = history.search(options);
      if (options.limit) {
        entries = entries.slice(0, options.limit);
      }

      if (entries.length === 0) {
        console.log('No history entries found.');
        return;
      }

      console.log(`\nFound ${entries.length} entries:\n`);
      entries.forEach((entry, i) => printEntryLine(i, entry));
    } catch (error) {
      fail(error);
    }
  });

historyCommand
  .command('show')
  .description('Show one entry in full')
  .argument('<index>', 'Entry index (0 = most recent)', parseCount)
  .action(async (index: number, _options: unknown, command: Command) => {
    try {
      const { history } = await contextFor(command);
      const entry = history.getEntry(index);
      if (!entry) {
        fail(new Error(`Entry ${index} not found.`));
        return;
      }

      console.log(`\n${RULE}\nORIGINAL PROMPT:\n${RULE}`);
      console.log(entry.original_prompt ?? '');
      console.log(`\n${RULE}\nENHANCED PROMPT:\n${RULE}`);
      console.log(entry.enhanced_prompt ?? '');
      console.log(`${RULE}\n`);
      console.log(`Provider: ${entry.provider ?? 'unknown'} / Model: ${entry.model ?? 'unknown'}`);
      console.log(`Timestamp: ${entry.timestamp ?? 'unknown'}`);
      if (entry.tokens_used) {
        console.log(`Tokens: ${entry.tokens_used}`);
      }
    } catch (error) {
      fail(error);
    }
  });

historyCommand
  .command('export')
  .description('Write every entry to a file')
  .argument('<output>', 'Output file')
  .addOption(
    new Option('-f, --format <format>', 'array (one JSON document) or lines (JSONL)')
      .choices(EXPORT_FORMATS)
      .default('array'),
  )
  .action(async (output: string, options: ExportOptions, command: Command) => {
    try {
      const { history } = await contextFor(command);
      const target = resolve(output);
      const count = history.export(target, options.format);
      console.log(`Exported ${count} entries to ${target}`);
    } catch (error) {
      fail(error);
    }
  });

historyCommand
  .command('clear')
  .description('Delete all history')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options: ClearOptions, command: Command) => {
    try {
      const { history } = await contextFor(command);
      const proceed =
        options.yes ||
        (await confirm({ message: 'Are you sure you want to clear all history?', default: false }));
      if (!proceed) {
        console.log('Cancelled');
        return;
      }
      if (!history.clear()) {
        fail(new Error('Failed to clear history'));
        return;
      }
      console.log('History cleared');
    } catch (error) {
      fail(error);
    }
  });
