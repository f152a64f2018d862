/**
 * Application context
 *
 * Builds every component once, from one config directory, and hands each
 * its collaborators explicitly. Entry points (CLI, embedding code) create a
 * context and pass it down instead of reaching for module-level state.
 */

import { join } from 'path';
import { ConfigStore, getDefaultConfigDir } from './config/index.js';
import { LOGS_DIR, LOG_FILE, SIBLING_APP_NAME } from './config/defaults.js';
import { ConfigImportMerger } from './config/import.js';
import { findSiblingConfig } from './config/sibling.js';
import { CredentialVault } from './credentials/vault.js';
import { OsKeychain, type SecretBackend } from './credentials/keychain.js';
import { RateGovernor } from './limits/rate-governor.js';
import { EnhancementPipeline } from './prompt/enhancer.js';
import { HistoryStore } from './store/history.js';
import { ProjectStore } from './store/projects.js';
import { Logger, logger as rootLogger } from './utils/logger.js';
import type { LogLevel } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

export interface AppContextOptions {
  configDir?: string;
  /** Secure storage; defaults to the OS keychain */
  secretBackend?: SecretBackend;
  /** Keychain namespace migrated from; null disables migration and import */
  siblingApp?: string | null;
  /** Run the one-shot sibling config import (default true) */
  importSibling?: boolean;
  logLevel?: LogLevel;
  /** Write logs to `<configDir>/logs/` (default true) */
  logToFile?: boolean;
  /** Clock in milliseconds for the rate governor and pipeline */
  now?: () => number;
}

export interface AppContext {
  logger: Logger;
  config: ConfigStore;
  vault: CredentialVault;
  governor: RateGovernor;
  history: HistoryStore;
  projects: ProjectStore;
  pipeline: EnhancementPipeline;
}

/**
 * Build a context. Runs the sibling config import unless disabled.
 */
export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const configDir = options.configDir ?? getDefaultConfigDir();
  const level = options.logLevel ?? rootLogger.getLevel();

  const logger = new Logger({
    level,
    file: options.logToFile === false ? undefined : { path: join(configDir, LOGS_DIR, LOG_FILE) },
  });

  const config = new ConfigStore(configDir, logger.child('[config]'));
  const siblingApp = options.siblingApp === undefined ? SIBLING_APP_NAME : options.siblingApp;

  const vault = CredentialVault.create({
    backend: options.secretBackend ?? new OsKeychain(),
    config,
    siblingService: siblingApp,
    logger: logger.child('[vault]'),
  });

  const governor = new RateGovernor({
    limits: config.getRateLimits(),
    now: options.now,
    logger: logger.child('[rate]'),
  });

  const history = new HistoryStore(config.historyPath, logger.child('[history]'));
  const projects = new ProjectStore(config.projectsDir, logger.child('[projects]'));
  const pipeline = new EnhancementPipeline({
    vault,
    governor,
    history,
    projects,
    now: options.now,
    logger: logger.child('[enhance]'),
  });

  const context: AppContext = { logger, config, vault, governor, history, projects, pipeline };

  if (siblingApp && options.importSibling !== false) {
    await importSiblingConfig(context, siblingApp);
  }

  return context;
}

/**
 * Find the sibling config and merge it. Failures are logged, never thrown.
 */
export async function importSiblingConfig(context: AppContext, appName: string): Promise<boolean> {
  const log = context.logger.child('[import]');
  try {
    const found = findSiblingConfig({ configDir: context.config.configDir, appName, logger: log });
    if (!found) {
      log.debug(`No ${appName} config with data found for import`);
      return false;
    }

    const merger = new ConfigImportMerger(context.config, context.vault, log);
    const imported = await merger.importOnce(found.document);
    if (imported) {
      context.config.save();
    }
    return imported;
  } catch (error) {
    log.debug(`Failed to import ${appName} settings: ${errorMessage(error)}`);
    return false;
  }
}
