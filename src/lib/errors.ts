/**
 * Error hierarchy shared by the extraction pipeline and the route handlers.
 * Route handlers turn any AppError into `{ error }` with its status code.
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'FILE_TOO_LARGE';

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: AppErrorCode,
    statusCode: number,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }
}

// Missing or malformed request input, raised before any processing starts
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(declaredType: string) {
    super(
      `Unsupported file type "${declaredType}". Please upload a PDF, DOCX, or TXT file.`,
      'UNSUPPORTED_FORMAT',
      415,
      { declaredType }
    );
  }
}

// Corrupt, encrypted, or empty documents. Never retried.
export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'EXTRACTION_FAILED', 422, options?.context);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class FileTooLargeError extends AppError {
  constructor(field: string, maxBytes: number) {
    const maxMb = Math.round(maxBytes / (1024 * 1024));
    super(`File size must be less than ${maxMb}MB`, 'FILE_TOO_LARGE', 413, { field, maxBytes });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
