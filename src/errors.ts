/**
 * Raised for invalid caller input (empty query, bad image source, unknown image id).
 * MCP tools and HTTP routes always show its message, whatever the log level.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** Raised when a required setting (cluster URL, API key) is missing. Its message is always shown. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** True for errors whose message is safe and useful to return to an MCP client. */
export function isUserFacingError(error: unknown): error is InvalidInputError | ConfigurationError {
  return error instanceof InvalidInputError || error instanceof ConfigurationError;
}
