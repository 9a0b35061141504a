/**
 * Errors raised by the handler itself.
 *
 * Query and resolver failures are not represented here: graphql-js reports
 * them inside the execution result.
 */

/**
 * Base gqlserve error.
 */
export class GqlServeError extends Error {
  readonly code: string;
  readonly extensions: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    extensions: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'GqlServeError';
    this.code = code;
    this.extensions = extensions;
  }

  /**
   * Converts to a GraphQL-compatible error format.
   */
  toJSON(): { message: string; extensions: Record<string, unknown> } {
    return {
      message: this.message,
      extensions: {
        code: this.code,
        ...this.extensions,
      },
    };
  }
}

/**
 * Invalid handler configuration. Thrown at construction, never per request.
 */
export class ConfigurationError extends GqlServeError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Request body larger than the configured in-memory limit.
 */
export class PayloadTooLargeError extends GqlServeError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`, 'PAYLOAD_TOO_LARGE', { limit });
    this.name = 'PayloadTooLargeError';
    this.limit = limit;
  }
}

/**
 * Unexpected failure while serving a request.
 */
export class InternalServerError extends GqlServeError {
  constructor(message = 'Internal server error', cause?: Error) {
    super(message, 'INTERNAL_SERVER_ERROR', {}, { cause });
    this.name = 'InternalServerError';
  }
}

/**
 * Normalizes a thrown value into an `Error`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
