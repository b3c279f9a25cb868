/**
 * The category of a failed call.
 */
type FactomErrorKind = "transport" | "serialization" | "deserialization" | "application";

/**
 * FactomError is the base class for every error raised by the library.
 * @class FactomError
 */
abstract class FactomError extends Error {
  /**
   * The category of the failure. Narrows the error in `switch` statements.
   */
  abstract readonly kind: FactomErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The HTTP exchange itself failed: the endpoint could not be parsed,
 * the connection was refused, the request was aborted or the body could not be read.
 */
class TransportError extends FactomError {
  readonly kind = "transport";

  /**
   * The endpoint the request was sent to.
   */
  readonly endpoint: string;

  constructor(message: string, endpoint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.endpoint = endpoint;
  }
}

/**
 * The request could not be encoded as JSON.
 */
class SerializationError extends FactomError {
  readonly kind = "serialization";

  readonly method: string;

  constructor(message: string, method: string, options?: { cause?: unknown }) {
    super(message, options);
    this.method = method;
  }
}

/**
 * The response body is not a well-formed JSON-RPC 2.0 envelope.
 */
class DeserializationError extends FactomError {
  readonly kind = "deserialization";

  /**
   * The raw body that failed to decode.
   */
  readonly body: string;

  constructor(message: string, body: string, options?: { cause?: unknown }) {
    super(message, options);
    this.body = body;
  }
}

/**
 * The daemon answered with an error envelope.
 * It is only thrown by {@link ApiResponse.unwrap}; calls resolve with the error as data.
 */
class ApplicationError extends FactomError {
  readonly kind = "application";

  readonly code: number;

  readonly method: string;

  readonly data?: unknown;

  constructor(method: string, code: number, message: string, data?: unknown) {
    super(message);
    this.method = method;
    this.code = code;
    this.data = data;
  }
}

/**
 * Checks if the value is one of the library errors.
 * @param error The value to check.
 */
const isFactomError = (error: unknown): error is FactomError => {
  return error instanceof FactomError;
};

export {
  FactomError,
  TransportError,
  SerializationError,
  DeserializationError,
  ApplicationError,
  isFactomError,
};
export type { FactomErrorKind };
