import { Command } from 'commander';
import { DEFAULT_QUOTAS, RateGovernor } from '../limits/rate-governor.js';
import { contextFor, fail } from './shared.js';

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Expected a positive number, got '${value}'`);
  }
  return n;
}

export const limitsCommand = new Command('limits').description('Inspect and configure provider rate limits');

limitsCommand
  .command('show')
  .description('Show the limit in force for each provider')
  .action(async (_options: unknown, command: Command) => {
    try {
      const { config } = await contextFor(command);
      const governor = new RateGovernor({ limits: config.getRateLimits() });
      const providers = [...new Set([...Object.keys(DEFAULT_QUOTAS), ...Object.keys(config.getRateLimits())])];

      for (const provider of providers.sort()) {
        const { calls, window } = governor.getLimit(provider);
        console.log(`${provider}: ${calls} calls / ${window}s`);
      }
    } catch (error) {
      fail(error);
    }
  });

limitsCommand
  .command('set')
  .description('Persist a custom limit for a provider')
  .argument('<provider>', 'Provider id')
  .argument('<calls>', 'Calls allowed per window', parsePositive)
  .argument('[window]', 'Window length in seconds', parsePositive, 60)
  .action(async (provider: string, calls: number, window: number, _options: unknown, command: Command) => {
    try {
      const { config, governor } = await contextFor(command);
      governor.setLimit(provider, calls, window);
      config.setRateLimit(provider, governor.getLimit(provider));
      config.save();
      console.log(`${provider.trim().toLowerCase()}: ${calls} calls / ${window}s`);
    } catch (error) {
      fail(error);
    }
  });
