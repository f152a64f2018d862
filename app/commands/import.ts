import { Command } from 'commander';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigImportMerger } from '../config/import.js';
import { SIBLING_APP_NAME } from '../config/defaults.js';
import { importSiblingConfig } from '../context.js';
import { contextFor, fail } from './shared.js';

interface ImportOptions {
  from?: string;
}

export const importCommand = new Command('import')
  .description(`Import keys and auth settings from ${SIBLING_APP_NAME} (never overwrites local values)`)
  .option('--from <path>', 'Read this config.json instead of searching for one')
  .action(async (options: ImportOptions, command: Command) => {
    try {
      const context = await contextFor(command, { importSibling: false });
      let imported: boolean;

      if (options.from) {
        const document: unknown = JSON.parse(readFileSync(resolve(options.from), 'utf-8'));
        const merger = new ConfigImportMerger(context.config, context.vault, context.logger.child('[import]'));
        imported = await merger.importOnce(document);
        if (imported) {
          context.config.save();
        }
      } else {
        imported = await importSiblingConfig(context, SIBLING_APP_NAME);
      }

      console.log(imported ? 'Imported settings' : 'Nothing to import');
    } catch (error) {
      fail(error);
    }
  });
