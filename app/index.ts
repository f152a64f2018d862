/**
 * PromptSmith
 *
 * Prompt history, project collections, provider credentials and rate
 * limiting for prompt-enhancement tools.
 */

export * from './config/index.js';
export { ConfigImportMerger, normalizeAuthMode } from './config/import.js';
export { findSiblingConfig, siblingConfigCandidates } from './config/sibling.js';
export * from './credentials/index.js';
export * from './store/index.js';
export { RateGovernor, DEFAULT_QUOTAS } from './limits/rate-governor.js';
export type { AdmitOptions, Headroom, Quota, RateGovernorOptions } from './limits/rate-governor.js';
export { EnhancementPipeline } from './prompt/enhancer.js';
export type { EnhanceRequest, ModelCaller, ModelRequest, ModelResponse } from './prompt/enhancer.js';
export { createAppContext, importSiblingConfig } from './context.js';
export type { AppContext, AppContextOptions } from './context.js';
export * from './utils/errors.js';
export { Logger, logger } from './utils/logger.js';
export type { LogLevel, LoggerOptions } from './utils/logger.js';
export { isSafeFilename, isSafePath } from './utils/paths.js';
