/**
 * Application error hierarchy.
 * Each error carries a stable code and HTTP status so the error handler
 * can map it to a structured JSON response.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, 404, details);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(limitBytes: number) {
    super('PAYLOAD_TOO_LARGE', `Request body exceeds ${limitBytes} bytes`, 413, { limitBytes });
  }
}

/** Raised at wiring time: bad environment, invalid tool definition, etc. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, 500, details);
  }
}

/** The language model returned something we cannot interpret. */
export class ModelResponseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MODEL_RESPONSE_ERROR', message, 502, details);
  }
}
