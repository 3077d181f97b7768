/**
 * Base class for every error the conversation domain raises on purpose
 */
export abstract class KindredError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The message was empty or whitespace only
 */
export class InvalidInputError extends KindredError {
  readonly code = "INVALID_INPUT";

  constructor(message = "No message provided") {
    super(message);
  }
}

/**
 * A summary was requested for a session that never recorded an interaction
 */
export class SessionNotFoundError extends KindredError {
  readonly code = "SESSION_NOT_FOUND";

  constructor(readonly sessionId: string) {
    super(`Session "${sessionId}" not found`);
  }
}

/**
 * The configured sentiment model failed or timed out. Always recovered by the
 * classifier and never surfaced to callers.
 */
export class ExternalModelError extends KindredError {
  readonly code = "EXTERNAL_MODEL_ERROR";

  constructor(
    readonly modelId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${modelId}: ${message}`, options);
  }
}

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
