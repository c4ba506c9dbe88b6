/**
 * Typed errors for the review pipeline
 */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Sandbox environment could not be prepared. Fatal to the run.
 */
export class SandboxError extends Error {
  constructor(
    message: string,
    public readonly command?: string[],
  ) {
    super(message);
    this.name = 'SandboxError';
  }
}

export class GitHubAPIError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'GitHubAPIError';
  }
}

/**
 * The summary comment could not be posted
 */
export class PublishError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PublishError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Numeric HTTP status carried by an SDK error, if any
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
