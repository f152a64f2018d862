import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { SecretBackend } from '../../app/credentials/keychain.js';
import { Logger } from '../../app/utils/logger.js';

/**
 * In-process keychain keyed by `service/account`
 */
export class MemoryBackend implements SecretBackend {
  readonly secrets = new Map<string, string>();
  available = true;

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async load(service: string, account: string): Promise<string | null> {
    return this.secrets.get(`${service}/${account}`) ?? null;
  }

  async save(service: string, account: string, secret: string): Promise<void> {
    if (!this.available) {
      throw new Error('keychain unavailable');
    }
    this.secrets.set(`${service}/${account}`, secret);
  }

  async delete(service: string, account: string): Promise<void> {
    this.secrets.delete(`${service}/${account}`);
  }
}

export function quietLogger(): Logger {
  return new Logger({ console: false });
}

export function tempDir(prefix = 'promptsmith-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}
