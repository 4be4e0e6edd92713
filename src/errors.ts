/**
 * Base class for every failure the pipeline reports to its caller.
 * The message is meant to be shown to the user as-is.
 */
export class PitchDeckError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidIdeaError extends PitchDeckError {}

/**
 * Missing or placeholder API key, detected before any request is sent
 */
export class AuthConfigurationError extends PitchDeckError {}

/**
 * The model service rejected the API key
 */
export class ModelAuthenticationError extends PitchDeckError {}

export class RateLimitError extends PitchDeckError {}

export class ModelServiceError extends PitchDeckError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
