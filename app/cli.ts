import { Command } from 'commander';
import { APP_VERSION } from './config/defaults.js';
import { historyCommand } from './commands/history.js';
import { importCommand } from './commands/import.js';
import { keysCommand } from './commands/keys.js';
import { limitsCommand } from './commands/limits.js';
import { projectCommand } from './commands/project.js';

const program = new Command();

program
  .name('promptsmith')
  .description('PromptSmith CLI - prompt history, projects and provider keys')
  .version(APP_VERSION)
  .option('--config-dir <dir>', 'Configuration directory (default: platform config dir)')
  .option('-v, --verbose', 'Log debug output to stderr');

// Register commands
program.addCommand(historyCommand);
program.addCommand(projectCommand);
program.addCommand(keysCommand);
program.addCommand(limitsCommand);
program.addCommand(importCommand);

export { program };
