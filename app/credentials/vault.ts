/**
 * Credential Vault
 *
 * Resolves provider API keys through an ordered chain of resolvers:
 *   1. the OS keychain under this application's namespace
 *   2. `providers.<id>.api_key` in config.json
 *   3. the sibling application's keychain namespace (copied into 1 on a hit)
 *
 * Writes go to the keychain, and to config.json only when the keychain
 * write did not succeed. Resolver failures are logged and treated as
 * "not available"; they never reach the caller.
 */

import { normalizeProvider, type ConfigStore } from '../config/index.js';
import { APP_NAME, SIBLING_APP_NAME } from '../config/defaults.js';
import type { SecretBackend } from './keychain.js';
import {
  ConfigFileResolver,
  KeychainResolver,
  MigratingKeychainResolver,
  type CredentialResolver,
} from './resolvers.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface CredentialVaultOptions {
  backend: SecretBackend;
  config: ConfigStore;
  /** Own keychain namespace */
  service?: string;
  /** Keychain namespace migrated from; null disables migration */
  siblingService?: string | null;
  logger?: Logger;
}

export interface CredentialLocation {
  provider: string;
  /** Name of the resolver that answered, or null when nothing did */
  source: string | null;
}

/**
 * `get` walks `lookup` in order; `set` tries `primary`, then `fallback`.
 */
export interface CredentialChain {
  lookup: CredentialResolver[];
  primary: CredentialResolver;
  fallback: CredentialResolver;
}

/**
 * keychain, config file, then the sibling keychain namespace
 */
export function defaultCredentialChain(options: CredentialVaultOptions, log: Logger): CredentialChain {
  const keychain = new KeychainResolver(options.backend, options.service ?? APP_NAME, log);
  const file = new ConfigFileResolver(options.config);
  const sibling = options.siblingService === undefined ? SIBLING_APP_NAME : options.siblingService;

  const lookup: CredentialResolver[] = [keychain, file];
  if (sibling) {
    lookup.push(new MigratingKeychainResolver(options.backend, sibling, keychain, log));
  }
  return { lookup, primary: keychain, fallback: file };
}

export class CredentialVault {
  private readonly lookup: CredentialResolver[];
  private readonly primary: CredentialResolver;
  private readonly fallback: CredentialResolver;
  private readonly log: Logger;

  constructor(chain: CredentialChain, log: Logger = rootLogger.child('[vault]')) {
    this.lookup = [...chain.lookup];
    this.primary = chain.primary;
    this.fallback = chain.fallback;
    this.log = log;
  }

  static create(options: CredentialVaultOptions): CredentialVault {
    const log = options.logger ?? rootLogger.child('[vault]');
    return new CredentialVault(defaultCredentialChain(options, log), log);
  }

  /**
   * Names of the resolvers in lookup order
   */
  get chain(): string[] {
    return this.lookup.map((resolver) => resolver.name);
  }

  async get(provider: string): Promise<string | null> {
    return (await this.resolve(provider)).secret;
  }

  /**
   * Which resolver currently answers for a provider
   */
  async locate(provider: string): Promise<CredentialLocation> {
    const { source } = await this.resolve(provider);
    return { provider: normalizeProvider(provider), source };
  }

  /**
   * Store a key. Resolves true when it landed in the keychain, false when
   * it went to the config file instead (or could not be stored at all).
   */
  async set(provider: string, secret: string): Promise<boolean> {
    const id = normalizeProvider(provider);
    if (!id || !secret) {
      this.log.warn('Refusing to store an empty provider id or key');
      return false;
    }

    this.log.info(`Setting API key for provider: ${id}`);

    if (await this.trySet(this.primary, id, secret)) {
      return true;
    }

    this.log.debug(`Keychain not available, using file storage for ${id}`);
    await this.trySet(this.fallback, id, secret);
    return false;
  }

  /**
   * Remove a key from every writable store. Resolves true if any held it.
   */
  async delete(provider: string): Promise<boolean> {
    const id = normalizeProvider(provider);
    let removed = false;
    for (const resolver of [this.primary, this.fallback]) {
      if (!resolver.delete) continue;
      try {
        removed = (await resolver.delete(id)) || removed;
      } catch (error) {
        this.log.warn(`Failed to delete ${id} key from ${resolver.name}: ${errorMessage(error)}`);
      }
    }
    return removed;
  }

  private async resolve(provider: string): Promise<{ secret: string | null; source: string | null }> {
    const id = normalizeProvider(provider);
    if (!id) {
      return { secret: null, source: null };
    }

    for (const resolver of this.lookup) {
      try {
        const secret = await resolver.get(id);
        if (secret) {
          return { secret, source: resolver.name };
        }
      } catch (error) {
        this.log.debug(`Resolver ${resolver.name} unavailable for ${id}: ${errorMessage(error)}`);
      }
    }
    return { secret: null, source: null };
  }

  private async trySet(resolver: CredentialResolver, provider: string, secret: string): Promise<boolean> {
    if (!resolver.set) {
      return false;
    }
    try {
      return await resolver.set(provider, secret);
    } catch (error) {
      this.log.warn(`Failed to store key in ${resolver.name}: ${errorMessage(error)}`);
      return false;
    }
  }
}
