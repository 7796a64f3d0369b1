import { AppError } from "./app-error.js";

interface ErrorOptions {
  requestId?: string;
  details?: Record<string, unknown>;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorOptions) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      requestId: options?.requestId,
      details: options?.details ?? { fields },
    });
    this.fields = fields;
  }
}

/**
 * A remote document could not be fetched: non-2xx status, timeout or a
 * network failure. Fails only the call that requested it.
 */
export class SourceUnavailableError extends AppError {
  public readonly url: string;
  public readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: ErrorOptions) {
    super({
      message,
      statusCode: 422,
      code: "SOURCE_UNAVAILABLE",
      requestId: options?.requestId,
      details: options?.details ?? { url, ...(status !== undefined ? { status } : {}) },
    });
    this.url = url;
    this.status = status;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      requestId: options?.requestId,
      details: options?.details,
    });
    this.service = service;
  }
}
