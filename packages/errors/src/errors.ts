import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Bad input: unknown file type, oversized or empty file, invalid chunking parameters. */
export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, extras?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...extras });
    this.fields = fields;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", extras?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...extras });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", extras?: ErrorExtras) {
    super({ message, statusCode: 409, code: "CONFLICT", ...extras });
  }
}

/** A processing-status change outside the allowed state machine. */
export class InvalidTransitionError extends AppError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string, extras?: ErrorExtras) {
    super({
      message: `Invalid status transition: ${from} -> ${to}`,
      statusCode: 409,
      code: "INVALID_TRANSITION",
      ...extras,
    });
    this.from = from;
    this.to = to;
  }
}

/** Unreadable document content or a file type with no extractor. */
export class ExtractionError extends AppError {
  public readonly fileType: string;

  constructor(message: string, fileType: string, extras?: ErrorExtras) {
    super({ message, statusCode: 422, code: "EXTRACTION_FAILED", ...extras });
    this.fileType = fileType;
  }
}

/**
 * Stored object does not match what was uploaded. Fatal for the current task
 * attempt; a fresh attempt re-reads the source, so the queue may retry.
 */
export class IntegrityError extends AppError {
  constructor(message: string, extras?: ErrorExtras) {
    super({ message, statusCode: 500, code: "INTEGRITY_MISMATCH", ...extras });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, extras?: ErrorExtras) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...extras });
    this.service = service;
  }
}

export class StorageError extends ExternalServiceError {
  public readonly key: string;

  constructor(message: string, key: string, extras?: ErrorExtras) {
    super(message, "object-store", extras);
    this.key = key;
  }
}

/** Raised inside a running task once its id has been revoked. Never retried. */
export class TaskRevokedError extends AppError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super({ message: `Task ${taskId} was revoked`, statusCode: 409, code: "TASK_REVOKED" });
    this.taskId = taskId;
  }
}
