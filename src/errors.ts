/**
 * Error classes raised by endpoint definitions, requests and configuration.
 *
 * @module errors
 */

/**
 * Raised while a resource type is being defined, when an endpoint shape is
 * invalid or an operation name is registered twice. Never raised by a request.
 */
export class DefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DefinitionError";
  }
}

/**
 * Raised by a transport when no response was received at all
 * (connection refused, DNS failure, timeout).
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Raised by a transport when the server answered with a non-success status.
 */
export class ServerError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly body: unknown,
    message: string,
  ) {
    super(message);
    this.name = "ServerError";
  }
}

/**
 * Raised before dispatch when call arguments cannot be used as given:
 * a `limit` that is neither `"all"` nor a non-negative integer, or a
 * missing identifier for an endpoint that requires one.
 */
export class InvalidParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParamsError";
  }
}

/**
 * Raised when a page is expected but the response body does not carry a
 * `data` array (or carries a `next_cursor` that is not a string).
 */
export class ResponseShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseShapeError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
