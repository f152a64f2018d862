/**
 * Config import
 *
 * Copies credentials and Google auth fields from a sibling application's
 * config into ours. Only fields we do not already have are copied; nothing
 * is deleted or overwritten, so running it again is a no-op.
 */

import { siblingConfigSchema } from './schema.js';
import type { ConfigStore } from './index.js';
import type { CredentialVault } from '../credentials/vault.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * Map the sibling's auth mode spellings onto ours
 */
export function normalizeAuthMode(mode: string): string {
  if (mode === 'api_key' || mode === 'API Key') return 'api-key';
  if (mode === 'Google Cloud Account') return 'gcloud';
  return mode;
}

export class ConfigImportMerger {
  private readonly log: Logger;

  constructor(
    private readonly config: ConfigStore,
    private readonly vault: CredentialVault,
    log: Logger = rootLogger.child('[import]'),
  ) {
    this.log = log;
  }

  /**
   * Merge a parsed source document. Resolves true if anything was copied;
   * persisting the config is left to the caller.
   */
  async importOnce(source: unknown): Promise<boolean> {
    const parsed = siblingConfigSchema.safeParse(source);
    if (!parsed.success) {
      this.log.debug(`Source config not importable: ${parsed.error.message}`);
      return false;
    }
    const sibling = parsed.data;
    let imported = false;

    for (const [provider, providerConfig] of Object.entries(sibling.providers ?? {})) {
      const apiKey = providerConfig.api_key;
      if (!apiKey) continue;
      if (await this.vault.get(provider)) continue;

      await this.vault.set(provider, apiKey);
      this.log.info(`Imported API key for ${provider}`);
      imported = true;
    }

    const local = this.config.data;

    if (sibling.auth_mode && !local.auth_mode) {
      this.config.update({ auth_mode: normalizeAuthMode(sibling.auth_mode) });
      imported = true;
    }

    if (sibling.gcloud_project_id && !local.gcloud_project_id) {
      this.config.update({ gcloud_project_id: sibling.gcloud_project_id });
      imported = true;
    }

    if (sibling.gcloud_auth_validated && !local.gcloud_auth_validated) {
      this.config.update({ gcloud_auth_validated: sibling.gcloud_auth_validated });
      imported = true;
    }

    return imported;
  }
}
