import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  appConfigSchema,
  rateLimitSchema,
  recoverableConfigSchema,
  uiStateSchema,
  type AppConfig,
  type AuthMode,
  type EnhancementDefaults,
  type ProviderConfig,
  type RateLimitConfig,
  type UiState,
} from './schema.js';
import {
  CONFIG_FILE,
  GOOGLE_PROVIDERS,
  HISTORY_FILE,
  LOGS_DIR,
  PROJECTS_DIR,
  STATE_FILE,
  defaultConfig,
} from './defaults.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export type { AppConfig, AuthMode, EnhancementDefaults, ProviderConfig, RateLimitConfig } from './schema.js';
export {
  APP_NAME,
  APP_VERSION,
  SIBLING_APP_NAME,
  defaultConfig,
  getDefaultConfigDir,
} from './defaults.js';

/**
 * Normalise a provider id for storage and lookup
 */
export function normalizeProvider(provider: string): string {
  return provider.trim().toLowerCase();
}

/**
 * Parse a JSON file, returning null when it is missing or unreadable
 */
function readJsonFile(path: string, log: Logger): unknown {
  if (!existsSync(path)) {
    return null;
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    log.warn(`Ignoring unreadable ${path}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Application configuration backed by `<configDir>/config.json`.
 *
 * Mutations are in-memory until `save()` is called.
 */
export class ConfigStore {
  readonly configDir: string;
  readonly configPath: string;
  readonly statePath: string;
  private config: AppConfig;
  private readonly log: Logger;

  constructor(configDir: string, log: Logger = rootLogger.child('[config]')) {
    this.configDir = configDir;
    this.configPath = join(configDir, CONFIG_FILE);
    this.statePath = join(configDir, STATE_FILE);
    this.log = log;
    this.config = this.load();
  }

  /**
   * Load configuration from disk. A missing or unreadable file yields
   * defaults; an invalid field falls back to its own default.
   */
  private load(): AppConfig {
    mkdirSync(this.configDir, { recursive: true });

    const raw = readJsonFile(this.configPath, this.log);
    if (raw === null) {
      return defaultConfig();
    }

    let config: AppConfig;
    const parsed = appConfigSchema.safeParse(raw);
    if (parsed.success) {
      config = parsed.data;
    } else {
      const recovered = recoverableConfigSchema.safeParse(raw);
      if (!recovered.success) {
        this.log.warn(`Invalid config at ${this.configPath}, using defaults: ${recovered.error.message}`);
        return defaultConfig();
      }
      const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.slice(0, 2).join('.')))];
      this.log.warn(`Ignoring invalid config entries at ${this.configPath}: ${fields.join(', ')}`);
      config = recovered.data;
    }

    // Provider ids are case-insensitive; fold keys written by older versions
    const providers: Record<string, ProviderConfig> = {};
    for (const [id, providerConfig] of Object.entries(config.providers)) {
      providers[normalizeProvider(id)] = { ...providers[normalizeProvider(id)], ...providerConfig };
    }
    return { ...config, providers };
  }

  /**
   * Save current configuration to disk
   */
  save(): void {
    try {
      mkdirSync(this.configDir, { recursive: true });
      writeFileSync(this.configPath, `${JSON.stringify(this.config, null, 2)}\n`, 'utf-8');
      this.log.debug(`Configuration saved to ${this.configPath}`);
    } catch (error) {
      this.log.error('Failed to save configuration:', error);
      throw error;
    }
  }

  /**
   * Snapshot of the whole document
   */
  get data(): Readonly<AppConfig> {
    return this.config;
  }

  update(patch: Partial<AppConfig>): void {
    this.config = { ...this.config, ...patch };
  }

  get historyPath(): string {
    return join(this.configDir, HISTORY_FILE);
  }

  get projectsDir(): string {
    return join(this.configDir, PROJECTS_DIR);
  }

  get logsDir(): string {
    return join(this.configDir, LOGS_DIR);
  }

  // -------------------------------------------------------------------------
  // Providers
  // -------------------------------------------------------------------------

  getProviderConfig(provider: string): ProviderConfig {
    return { ...this.config.providers[normalizeProvider(provider)] };
  }

  setProviderConfig(provider: string, providerConfig: ProviderConfig): void {
    this.config = {
      ...this.config,
      providers: { ...this.config.providers, [normalizeProvider(provider)]: providerConfig },
    };
  }

  getProviderApiKey(provider: string): string | null {
    return this.getProviderConfig(provider).api_key || null;
  }

  setProviderApiKey(provider: string, apiKey: string): void {
    this.setProviderConfig(provider, { ...this.getProviderConfig(provider), api_key: apiKey });
  }

  /**
   * Remove a file-stored key. Returns whether one was present.
   */
  deleteProviderApiKey(provider: string): boolean {
    const current = this.getProviderConfig(provider);
    if (current.api_key === undefined) {
      return false;
    }
    const { api_key: _removed, ...rest } = current;
    this.setProviderConfig(provider, rest);
    return true;
  }

  listProviders(): string[] {
    return Object.keys(this.config.providers).sort();
  }

  // -------------------------------------------------------------------------
  // Google auth fields (shared by the gemini and google providers)
  // -------------------------------------------------------------------------

  getAuthMode(provider = 'gemini'): AuthMode {
    if (GOOGLE_PROVIDERS.includes(normalizeProvider(provider)) && this.config.auth_mode === 'gcloud') {
      return 'gcloud';
    }
    return 'api-key';
  }

  setAuthMode(provider: string, mode: AuthMode): void {
    if (GOOGLE_PROVIDERS.includes(normalizeProvider(provider))) {
      this.config = { ...this.config, auth_mode: mode };
    }
  }

  getAuthValidated(provider = 'gemini'): boolean {
    if (GOOGLE_PROVIDERS.includes(normalizeProvider(provider))) {
      return this.config.gcloud_auth_validated ?? false;
    }
    return false;
  }

  setAuthValidated(provider: string, validated: boolean, projectId?: string): void {
    if (!GOOGLE_PROVIDERS.includes(normalizeProvider(provider))) {
      return;
    }
    this.config = { ...this.config, gcloud_auth_validated: validated };
    if (validated && projectId) {
      this.setGcloudProjectId(projectId);
    }
  }

  getGcloudProjectId(): string | null {
    return this.config.gcloud_project_id || null;
  }

  setGcloudProjectId(projectId: string): void {
    this.config = { ...this.config, gcloud_project_id: projectId };
  }

  // -------------------------------------------------------------------------
  // Enhancement defaults and rate limits
  // -------------------------------------------------------------------------

  getEnhancementDefaults(): EnhancementDefaults {
    return { ...this.config.enhancement_defaults };
  }

  setEnhancementDefaults(defaults: EnhancementDefaults): void {
    this.config = { ...this.config, enhancement_defaults: defaults };
  }

  getRateLimits(): Record<string, RateLimitConfig> {
    const limits: Record<string, RateLimitConfig> = {};
    for (const [provider, limit] of Object.entries(this.config.rate_limits)) {
      limits[normalizeProvider(provider)] = limit;
    }
    return limits;
  }

  setRateLimit(provider: string, limit: RateLimitConfig): void {
    const rate_limits = { ...this.getRateLimits(), [normalizeProvider(provider)]: rateLimitSchema.parse(limit) };
    this.config = { ...this.config, rate_limits };
  }

  // -------------------------------------------------------------------------
  // UI state (state.json)
  // -------------------------------------------------------------------------

  loadUiState(): UiState {
    const raw = readJsonFile(this.statePath, this.log);
    const parsed = uiStateSchema.safeParse(raw);
    return parsed.success ? parsed.data : {};
  }

  saveUiState(state: UiState): void {
    mkdirSync(this.configDir, { recursive: true });
    writeFileSync(this.statePath, `${JSON.stringify(state, null, 2)}\n`, 'utf-8');
  }
}
