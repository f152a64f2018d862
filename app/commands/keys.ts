import { Command } from 'commander';
import { password } from '@inquirer/prompts';
import { DEFAULT_PROVIDER, DEFAULT_QUOTAS } from '../limits/rate-governor.js';
import { contextFor, fail } from './shared.js';

interface SetOptions {
  value?: string;
}

const SOURCE_LABELS: Record<string, string> = {
  keychain: 'Configured (system keychain)',
  config: 'Configured (config file, plaintext)',
};

function describeSource(source: string | null): string {
  if (!source) return 'Not configured';
  return SOURCE_LABELS[source] ?? `Configured (imported from ${source})`;
}

export const keysCommand = new Command('keys').description('Manage provider API keys');

keysCommand
  .command('set')
  .description('Store an API key (system keychain, or config file if unavailable)')
  .argument('<provider>', 'Provider id, e.g. openai')
  .option('--value <key>', 'Key to store (prompted for when omitted)')
  .action(async (provider: string, options: SetOptions, command: Command) => {
    try {
      const { vault } = await contextFor(command);
      const key = options.value ?? (await password({ message: `${provider} API key:`, mask: '*' }));
      if (!key.trim()) {
        fail(new Error('No key entered'));
        return;
      }

      const inKeychain = await vault.set(provider, key.trim());
      const location = await vault.locate(provider);
      if (!location.source) {
        fail(new Error(`Could not store key for ${provider}`));
        return;
      }
      console.log(
        inKeychain
          ? `Stored ${location.provider} key in the system keychain`
          : `Stored ${location.provider} key in the config file (plaintext)`,
      );
    } catch (error) {
      fail(error);
    }
  });

keysCommand
  .command('status')
  .description('Show where each provider key is found')
  .argument('[providers...]', 'Providers to check (default: all known)')
  .action(async (providers: string[], _options: unknown, command: Command) => {
    try {
      const { vault, config } = await contextFor(command);
      const known = Object.keys(DEFAULT_QUOTAS).filter((id) => id !== DEFAULT_PROVIDER);
      const ids = providers.length > 0 ? providers : [...new Set([...known, ...config.listProviders()])];

      for (const id of ids) {
        const { provider, source } = await vault.locate(id);
        console.log(`${provider}: ${describeSource(source)}`);
      }
    } catch (error) {
      fail(error);
    }
  });

keysCommand
  .command('delete')
  .description('Remove a stored API key')
  .argument('<provider>', 'Provider id')
  .action(async (provider: string, _options: unknown, command: Command) => {
    try {
      const { vault } = await contextFor(command);
      if (await vault.delete(provider)) {
        console.log(`Deleted ${provider} key`);
      } else {
        console.log(`No stored key for ${provider}`);
      }
    } catch (error) {
      fail(error);
    }
  });
