/**
 * Canonical application error. Every failure crossing a service boundary is
 * an AppError inside a Result, so a binding layer and the logger see one shape.
 */

export const ErrorCode = {
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  ACCOUNT_LOCKED: "ACCOUNT_LOCKED",
  INVALID_CODE: "INVALID_CODE",
  BAD_REQUEST: "BAD_REQUEST",
  UNAUTHORIZED: "UNAUTHORIZED",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  VALIDATION: "VALIDATION",
  INTERNAL: "INTERNAL",
  STORAGE_UNAVAILABLE: "STORAGE_UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const STATUS_MAP: Record<ErrorCode, number> = {
  INVALID_CREDENTIALS: 400,
  ACCOUNT_LOCKED: 423,
  INVALID_CODE: 401,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  CONFLICT: 409,
  VALIDATION: 422,
  INTERNAL: 500,
  STORAGE_UNAVAILABLE: 503,
};

/** Status a transport binding should answer with for a given code */
export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause !== undefined ? { ...error, details, cause } : { ...error, details };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const invalidCredentials = (): AppError =>
  appError(ErrorCode.INVALID_CREDENTIALS, "Unable to log in with provided credentials");

export const accountLocked = (msg = "Account is locked"): AppError =>
  appError(ErrorCode.ACCOUNT_LOCKED, msg);

export const invalidCode = (msg = "Invalid verification code"): AppError =>
  appError(ErrorCode.INVALID_CODE, msg);

export const badRequest = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.BAD_REQUEST, msg, details);

export const unauthorized = (msg = "Unauthorized"): AppError =>
  appError(ErrorCode.UNAUTHORIZED, msg);

export const notFound = (resource: string): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`);

export const conflict = (msg: string): AppError => appError(ErrorCode.CONFLICT, msg);

/** Itemized field errors: `{ fields: { email: ["..."], password2: ["..."] } }` */
export const validation = (fields: Record<string, readonly string[]>): AppError =>
  appError(ErrorCode.VALIDATION, "Validation failed", { fields });

export const internal = (msg = "Internal error", cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, msg, undefined, cause);

export const storageUnavailable = (msg = "Storage unavailable", cause?: unknown): AppError =>
  appError(ErrorCode.STORAGE_UNAVAILABLE, msg, undefined, cause);
