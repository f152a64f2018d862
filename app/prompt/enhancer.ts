/**
 * Prompt Enhancer
 *
 * Runs one enhancement end to end around an injected model caller:
 * resolve the provider key, wait for a rate-limit slot, call the model,
 * then record the result in history (and in a project when one is named).
 * The model call itself is supplied by the caller.
 */

import type { CredentialVault } from '../credentials/vault.js';
import type { RateGovernor } from '../limits/rate-governor.js';
import type { HistoryRecord, HistoryStore } from '../store/history.js';
import type { ProjectStore } from '../store/projects.js';
import { MissingCredentialError, RateLimitedError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * Request passed to the model caller
 */
export interface ModelRequest {
  prompt: string;
  provider: string;
  model: string;
  apiKey: string;
  settings: Record<string, unknown>;
  signal?: AbortSignal;
}

export interface ModelResponse {
  text: string;
  tokensUsed?: number | null;
}

export type ModelCaller = (request: ModelRequest) => Promise<ModelResponse>;

/**
 * Options for prompt enhancement
 */
export interface EnhanceRequest {
  /** The user's raw prompt */
  prompt: string;
  provider: string;
  model: string;
  /** Project collection to also save into (created on first use) */
  project?: string;
  /** Enhancement settings recorded alongside the result */
  settings?: Record<string, unknown>;
  /** Refuse instead of waiting when the provider's window is full */
  failFast?: boolean;
  signal?: AbortSignal;
}

export interface EnhancementPipelineDeps {
  vault: CredentialVault;
  governor: RateGovernor;
  history: HistoryStore;
  projects: ProjectStore;
  logger?: Logger;
  /** Clock in milliseconds, used for the recorded duration */
  now?: () => number;
}

export class EnhancementPipeline {
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly deps: EnhancementPipelineDeps) {
    this.log = deps.logger ?? rootLogger.child('[enhance]');
    this.now = deps.now ?? Date.now;
  }

  /**
   * Enhance a prompt and persist the result
   *
   * @throws MissingCredentialError when no key is configured for the provider
   * @throws RateLimitedError when the window is full and waiting was refused or aborted
   */
  async enhance(request: EnhanceRequest, callModel: ModelCaller): Promise<HistoryRecord> {
    const { vault, governor, history, projects } = this.deps;
    const original = request.prompt.trim();
    const settings = request.settings ?? {};

    const apiKey = await vault.get(request.provider);
    if (!apiKey) {
      throw new MissingCredentialError(request.provider);
    }

    const admitted = await governor.admit(request.provider, {
      blocking: !request.failFast,
      signal: request.signal,
    });
    if (!admitted) {
      throw new RateLimitedError(request.provider, governor.remaining(request.provider).resetInSeconds);
    }

    this.log.verbose(`Calling ${request.provider}/${request.model} (${original.length} chars)`);
    const startedAt = this.now();
    let response: ModelResponse;
    try {
      response = await callModel({
        prompt: original,
        provider: request.provider,
        model: request.model,
        apiKey,
        settings,
        signal: request.signal,
      });
    } catch (error) {
      this.log.error(`API call to ${request.provider}/${request.model} failed:`, error);
      throw error;
    }
    const duration = (this.now() - startedAt) / 1000;

    const record: HistoryRecord = {
      original_prompt: original,
      enhanced_prompt: response.text.trim(),
      provider: request.provider,
      model: request.model,
      settings,
      timestamp: new Date(this.now()).toISOString(),
      tokens_used: response.tokensUsed ?? null,
      duration_seconds: duration,
    };
    this.log.info(`Enhancement completed in ${duration.toFixed(2)}s, tokens: ${record.tokens_used ?? 'n/a'}`);

    history.add(record);

    if (request.project) {
      projects.getOrCreate(request.project).addPrompt(record);
      this.log.info(`Saved to project: ${request.project}`);
    }

    return record;
  }
}
