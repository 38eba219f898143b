/**
 * Application error hierarchy.
 *
 * Every error raised on purpose extends AppError so the HTTP layer can map it
 * to a status code without inspecting messages.
 */

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode = 500,
    isOperational = true,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: Record<string, unknown>) {
    super(message, 404, true, details);
  }
}

// --- Generation ---

export class GenerationError extends AppError {
  constructor(
    message: string,
    statusCode = 502,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, statusCode, true, details, options);
  }
}

/** Throttling or quota signal from the backend. Retried by the gateway. */
export class TransientBackendError extends GenerationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 503, details);
  }
}

/** Any backend failure that is not throttling. Never retried. */
export class PermanentBackendError extends GenerationError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 502, details, options);
  }
}

export class PermanentExtractionError extends GenerationError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 502, details, options);
  }
}

export class MalformedOutputError extends AppError {
  constructor(message = 'Model output contained no structured data', details?: Record<string, unknown>) {
    super(message, 422, true, details);
  }
}

// --- Extraction ---

export class ExtractionError extends AppError {
  public readonly documentId: string;

  constructor(documentId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const statusCode = cause instanceof AppError ? cause.statusCode : 502;
    super(`Extraction failed for document ${documentId}: ${reason}`, statusCode, true, { documentId }, { cause });
    this.documentId = documentId;
  }
}

export class CancelledError extends AppError {
  constructor(message = 'Operation cancelled') {
    super(message, 499, true);
  }
}

export class TimeoutError extends AppError {
  constructor(message = 'Operation timed out', details?: Record<string, unknown>) {
    super(message, 504, true, details);
  }
}

// --- Document source ---

/** The upstream news API failed or returned something unusable. */
export class SourceError extends AppError {
  constructor(message: string, statusCode = 502, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, statusCode, true, details, options);
  }
}

// --- Storage ---

export class StoreIOError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 500, false, details, options);
  }
}

/** Wrap any thrown value as an AppError, keeping AppErrors as they are. */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new AppError(message, 500, false, undefined, { cause: error });
}

export interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: Record<string, unknown>;
    timestamp: string;
    path?: string;
    requestId?: string;
  };
}

/** Status of an AppError, or of a framework error carrying its own statusCode. */
export function statusCodeOf(error: Error): number {
  if (error instanceof AppError) return error.statusCode;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return 500;
}

function codeOf(error: Error): string {
  if (error instanceof AppError) return error.name;
  return 'code' in error && typeof error.code === 'string' ? error.code : error.name;
}

export function formatErrorResponse(error: Error, path?: string, requestId?: string): ErrorResponse {
  return {
    success: false,
    error: {
      message: error.message,
      code: codeOf(error),
      statusCode: statusCodeOf(error),
      details: error instanceof AppError ? error.details : undefined,
      timestamp: new Date().toISOString(),
      path,
      requestId,
    },
  };
}
