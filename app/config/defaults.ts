import { homedir, platform } from 'os';
import { join } from 'path';
import type { AppConfig } from './schema.js';

export const APP_NAME = 'PromptSmith';
export const APP_VERSION = '0.1.0';

/** Keychain namespace of the application credentials are migrated from */
export const SIBLING_APP_NAME = 'ImageAI';

export const CONFIG_FILE = 'config.json';
export const STATE_FILE = 'state.json';
export const HISTORY_FILE = 'history.jsonl';
export const PROJECTS_DIR = 'projects';
export const LOGS_DIR = 'logs';
export const LOG_FILE = 'promptsmith.log';

/**
 * Providers whose auth mode and gcloud fields live in the top-level config
 */
export const GOOGLE_PROVIDERS = ['gemini', 'google'];

/**
 * Default configuration values
 */
export function defaultConfig(): AppConfig {
  return {
    providers: {},
    default_provider: 'openai',
    default_model: 'gpt-4o-mini',
    enhancement_defaults: {
      role: 'an expert assistant',
      reasoning: 'Standard',
      verbosity: 'medium',
      tools: ['web', 'code'],
      self_reflect: true,
      meta_fix: true,
    },
    rate_limits: {},
  };
}

/**
 * Platform-specific configuration directory.
 * `PROMPTSMITH_CONFIG_DIR` overrides it.
 */
export function getDefaultConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  os: NodeJS.Platform = platform(),
  home: string = homedir(),
): string {
  if (env.PROMPTSMITH_CONFIG_DIR) {
    return env.PROMPTSMITH_CONFIG_DIR;
  }

  if (os === 'win32') {
    return join(env.APPDATA || join(home, 'AppData', 'Roaming'), APP_NAME);
  }
  if (os === 'darwin') {
    return join(home, 'Library', 'Application Support', APP_NAME);
  }
  return join(env.XDG_CONFIG_HOME || join(home, '.config'), APP_NAME);
}
