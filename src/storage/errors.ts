export type ErrorCode =
  | "UNSUPPORTED_TYPE"
  | "SIZE_EXCEEDED"
  | "UNKNOWN_SERVICE"
  | "PATH_VIOLATION"
  | "WRITE_FAILURE"
  | "NOT_FOUND"
  | "DUPLICATE_PATH"
  | "INVALID_PAYLOAD"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  field?: string;
  message: string;
}

export class AppError extends Error {
  code: ErrorCode;
  status: number;
  details?: ErrorDetail[];

  constructor(
    code: ErrorCode,
    status: number,
    message: string,
    details?: ErrorDetail[],
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
  return err instanceof AppError && (code === undefined || err.code === code);
}

// ── Admission ──

export function unsupportedTypeError(ext: string): AppError {
  const shown = ext === "" ? "(none)" : ext;
  return new AppError("UNSUPPORTED_TYPE", 415, `File extension '${shown}' not allowed`);
}

export function sizeExceededError(size: number, max: number): AppError {
  return new AppError("SIZE_EXCEEDED", 413, `File size ${size} exceeds maximum ${max}`);
}

export function unknownServiceError(service: string): AppError {
  return new AppError("UNKNOWN_SERVICE", 400, `Unknown service: ${service}`);
}

// ── Filesystem ──

export function pathViolationError(input: string): AppError {
  return new AppError("PATH_VIOLATION", 400, `Path escapes storage root: ${JSON.stringify(input)}`);
}

export function writeFailureError(reason: string): AppError {
  return new AppError("WRITE_FAILURE", 500, `Write failed: ${reason}`);
}

// ── Records ──

export function notFoundError(filePath: string): AppError {
  return new AppError("NOT_FOUND", 404, `File ${filePath} not found`);
}

export function duplicatePathError(filePath: string): AppError {
  return new AppError("DUPLICATE_PATH", 409, `File path already exists: ${filePath}`);
}

export function invalidPayloadError(msg: string, details?: ErrorDetail[]): AppError {
  return new AppError("INVALID_PAYLOAD", 400, msg, details);
}
