/**
 * Error types shared across the screening pipeline.
 *
 * Per-row failures (BackendRequestError, ResponseParseError) are turned into
 * null-flagged analysis results by the analyzer. InputFileNotFoundError ends
 * the whole run.
 */

/**
 * The input CSV does not exist. Nothing is written when this is thrown.
 */
export class InputFileNotFoundError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Input file not found at '${filePath}'`);
    this.name = 'InputFileNotFoundError';
    this.filePath = filePath;
  }
}

/**
 * A model backend could not be created (missing API key, unknown backend type).
 */
export class BackendConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackendConfigError';
  }
}

/**
 * Connection failure or non-success HTTP status from a model backend.
 */
export class BackendRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendRequestError';
    this.status = status;
  }
}

/**
 * The model replied, but not with the expected JSON object.
 */
export class ResponseParseError extends Error {
  readonly content?: string;

  constructor(message: string, content?: string) {
    super(message);
    this.name = 'ResponseParseError';
    this.content = content;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
