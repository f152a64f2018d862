/**
 * Error types surfaced to callers.
 *
 * Absence (no credential, no entry) is modelled as `null`; these errors
 * cover caller contract violations only.
 */

export class PromptsmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'PromptsmithError';
  }
}

export class ProjectExistsError extends PromptsmithError {
  constructor(
    public readonly projectName: string,
    public readonly slug: string,
  ) {
    super(`Project '${projectName}' already exists`, 'PROJECT_EXISTS');
    this.name = 'ProjectExistsError';
  }
}

export class ProjectNotFoundError extends PromptsmithError {
  constructor(public readonly projectName: string) {
    super(`Project '${projectName}' not found`, 'PROJECT_NOT_FOUND');
    this.name = 'ProjectNotFoundError';
  }
}

export class MissingCredentialError extends PromptsmithError {
  constructor(public readonly provider: string) {
    super(`No API key configured for provider '${provider}'`, 'MISSING_CREDENTIAL');
    this.name = 'MissingCredentialError';
  }
}

export class RateLimitedError extends PromptsmithError {
  constructor(
    public readonly provider: string,
    public readonly resetInSeconds: number,
  ) {
    super(
      `Rate limit reached for '${provider}', next slot in ${resetInSeconds.toFixed(1)}s`,
      'RATE_LIMITED',
    );
    this.name = 'RateLimitedError';
  }
}

export class InvalidQuotaError extends PromptsmithError {
  constructor(
    public readonly provider: string,
    detail: string,
  ) {
    super(`Invalid rate limit for '${provider}': ${detail}`, 'INVALID_QUOTA');
    this.name = 'InvalidQuotaError';
  }
}

export class InvalidTimestampError extends PromptsmithError {
  constructor(public readonly value: string) {
    super(`Not a valid date or time: '${value}'`, 'INVALID_TIMESTAMP');
    this.name = 'InvalidTimestampError';
  }
}

export class UnsafePathError extends PromptsmithError {
  constructor(public readonly path: string) {
    super(`Refusing to use path outside its base directory: ${path}`, 'UNSAFE_PATH');
    this.name = 'UnsafePathError';
  }
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
