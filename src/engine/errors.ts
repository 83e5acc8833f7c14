export type Stage = "authenticate" | "validate" | "persist" | "list" | "delete" | "read";

export interface ErrorDetail {
  field?: string;
  rule?: string;
  message: string;
}

export class AppError extends Error {
  code: string;
  status: number;
  stage?: Stage;
  details?: ErrorDetail[];

  constructor(
    code: string,
    status: number,
    message: string,
    stage?: Stage,
    details?: ErrorDetail[],
  ) {
    super(message);
    this.code = code;
    this.status = status;
    this.stage = stage;
    this.details = details;
  }
}

// The message is the same whether the secret is wrong or none is configured.
export function authError(stage: Stage = "authenticate"): AppError {
  return new AppError("UNAUTHORIZED", 401, "Invalid credentials", stage);
}

export function validationError(message: string, details?: ErrorDetail[]): AppError {
  return new AppError("VALIDATION_FAILED", 400, message, "validate", details);
}

export function fileTooLargeError(size: number, max: number): AppError {
  return new AppError(
    "FILE_TOO_LARGE",
    413,
    `File too large: ${size} bytes (max ${max})`,
    "validate",
  );
}

export function unsupportedTypeError(ext: string): AppError {
  const label = ext ? `.${ext}` : "(none)";
  return new AppError("UNSUPPORTED_TYPE", 415, `File type not allowed: ${label}`, "validate");
}

export function invalidNameError(message: string, stage: Stage = "validate"): AppError {
  return new AppError("INVALID_NAME", 400, message, stage);
}

export function notFoundError(name: string, stage: Stage): AppError {
  return new AppError("NOT_FOUND", 404, `File ${name} not found`, stage);
}

export function storageError(message: string, stage: Stage): AppError {
  return new AppError("STORAGE_ERROR", 500, message, stage);
}

