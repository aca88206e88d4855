export class ImouError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An expected field or structure is missing from an API response. */
export class InvalidResponseError extends ImouError {}

/** The HTTP request never produced a response (network error, timeout). */
export class ConnectionFailedError extends ImouError {}

/** The API answered with an HTTP error or a non-zero result code. */
export class ApiError extends ImouError {}

/** App id / secret / endpoint are missing or rejected by the API. */
export class InvalidConfigurationError extends ImouError {}

export class NotAuthorizedError extends ImouError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
