/**
 * Locate the sibling application's config.json.
 *
 * Looks next to our own config directory and, when running under WSL, in
 * every Windows user's roaming AppData.
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { release } from 'os';
import { dirname, join } from 'path';
import { CONFIG_FILE, SIBLING_APP_NAME } from './defaults.js';
import { errorMessage } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface SiblingDiscoveryOptions {
  configDir: string;
  appName?: string;
  /** Root of mounted Windows user profiles, probed under WSL */
  windowsUsersDir?: string;
  isWsl?: boolean;
  logger?: Logger;
}

export interface SiblingConfig {
  path: string;
  document: Record<string, unknown>;
}

export function isWsl(): boolean {
  return process.platform === 'linux' && release().toLowerCase().includes('microsoft');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Whether a document carries anything worth importing
 */
export function hasImportableData(document: Record<string, unknown>): boolean {
  const providers = document.providers;
  const hasProviders = isRecord(providers) && Object.keys(providers).length > 0;
  return hasProviders || Boolean(document.auth_mode) || Boolean(document.gcloud_project_id);
}

export function siblingConfigCandidates(options: SiblingDiscoveryOptions): string[] {
  const appName = options.appName ?? SIBLING_APP_NAME;
  const candidates = [join(dirname(options.configDir), appName, CONFIG_FILE)];

  if (options.isWsl ?? isWsl()) {
    const usersDir = options.windowsUsersDir ?? '/mnt/c/Users';
    try {
      for (const user of readdirSync(usersDir)) {
        candidates.push(join(usersDir, user, 'AppData', 'Roaming', appName, CONFIG_FILE));
      }
    } catch (error) {
      (options.logger ?? rootLogger).debug(`Error checking Windows AppData: ${errorMessage(error)}`);
    }
  }

  return candidates;
}

/**
 * First candidate that parses and has importable data, or null
 */
export function findSiblingConfig(options: SiblingDiscoveryOptions): SiblingConfig | null {
  const log = options.logger ?? rootLogger.child('[import]');

  for (const path of siblingConfigCandidates(options)) {
    if (!existsSync(path)) continue;
    try {
      const document: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (isRecord(document) && hasImportableData(document)) {
        log.info(`Found ${options.appName ?? SIBLING_APP_NAME} config with data at: ${path}`);
        return { path, document };
      }
      log.debug(`Config at ${path} is empty, skipping`);
    } catch (error) {
      log.debug(`Error reading config at ${path}: ${errorMessage(error)}`);
    }
  }

  return null;
}
