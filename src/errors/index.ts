/**
 * Raised for setup problems that must stop the run before any request is made.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
    readonly url: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
