/**
 * Credential resolvers
 *
 * Each resolver is one link of the lookup chain used by CredentialVault.
 * Providers passed in are already normalised (trimmed, lower-case).
 */

import { apiKeyAccount, type SecretBackend } from './keychain.js';
import type { ConfigStore } from '../config/index.js';
import type { Logger } from '../utils/logger.js';

export interface CredentialResolver {
  /** Short label reported by `CredentialVault.locate` */
  readonly name: string;
  get(provider: string): Promise<string | null>;
  /** Store a secret; resolves false when this store cannot take it */
  set?(provider: string, secret: string): Promise<boolean>;
  /** Remove a secret; resolves true when something was removed */
  delete?(provider: string): Promise<boolean>;
}

/**
 * The application's own namespace in the OS keychain
 */
export class KeychainResolver implements CredentialResolver {
  readonly name = 'keychain';

  constructor(
    private readonly backend: SecretBackend,
    private readonly service: string,
    private readonly log: Logger,
  ) {}

  async get(provider: string): Promise<string | null> {
    const key = await this.backend.load(this.service, apiKeyAccount(provider));
    if (key) {
      this.log.debug(`Retrieved API key for ${provider} from keychain`);
    }
    return key || null;
  }

  async set(provider: string, secret: string): Promise<boolean> {
    if (!(await this.backend.isAvailable())) {
      return false;
    }
    await this.backend.save(this.service, apiKeyAccount(provider), secret);
    this.log.info(`API key for ${provider} stored in system keychain`);
    return true;
  }

  async delete(provider: string): Promise<boolean> {
    const existing = await this.backend.load(this.service, apiKeyAccount(provider));
    if (!existing) {
      return false;
    }
    await this.backend.delete(this.service, apiKeyAccount(provider));
    this.log.info(`API key for ${provider} deleted from keychain`);
    return true;
  }
}

/**
 * `providers.<id>.api_key` in config.json. Plaintext at rest.
 */
export class ConfigFileResolver implements CredentialResolver {
  readonly name = 'config';

  constructor(private readonly config: ConfigStore) {}

  async get(provider: string): Promise<string | null> {
    return this.config.getProviderApiKey(provider);
  }

  async set(provider: string, secret: string): Promise<boolean> {
    this.config.setProviderApiKey(provider, secret);
    this.config.save();
    return true;
  }

  async delete(provider: string): Promise<boolean> {
    if (!this.config.deleteProviderApiKey(provider)) {
      return false;
    }
    this.config.save();
    return true;
  }
}

/**
 * Read-only lookup in another application's keychain namespace. A hit is
 * copied into our own namespace so the next lookup is served from there.
 */
export class MigratingKeychainResolver implements CredentialResolver {
  readonly name: string;

  constructor(
    private readonly backend: SecretBackend,
    private readonly sourceService: string,
    private readonly target: CredentialResolver,
    private readonly log: Logger,
  ) {
    this.name = `keychain:${sourceService}`;
  }

  async get(provider: string): Promise<string | null> {
    const key = await this.backend.load(this.sourceService, apiKeyAccount(provider));
    if (!key) {
      return null;
    }

    this.log.info(`Retrieved API key for ${provider} from ${this.sourceService} keychain`);
    try {
      const copied = (await this.target.set?.(provider, key)) ?? false;
      if (!copied) {
        this.log.debug(`Could not copy ${provider} key into ${this.target.name}`);
      }
    } catch (error) {
      this.log.warn(`Failed to migrate ${provider} key into ${this.target.name}:`, error);
    }
    return key;
  }
}
