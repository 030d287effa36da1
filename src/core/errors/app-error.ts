/**
 * Canonical application error: every failure in the system is expressed
 * as an AppError so the view layer, logging and the HTTP edge share one shape.
 */

export const ErrorCode = {
  // Client errors
  BAD_REQUEST: "BAD_REQUEST",
  NOT_FOUND: "NOT_FOUND",
  VALIDATION: "VALIDATION",
  CANCELLED: "CANCELLED",
  // Server errors
  INTERNAL: "INTERNAL",
  // Composition errors: programming or configuration faults, never user errors
  PROTOCOL_VIOLATION: "PROTOCOL_VIOLATION",
  RENDER_FAILED: "RENDER_FAILED",
  DUPLICATE_TARGET: "DUPLICATE_TARGET",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const STATUS_MAP: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  VALIDATION: 422,
  CANCELLED: 499,
  INTERNAL: 500,
  PROTOCOL_VIOLATION: 500,
  RENDER_FAILED: 500,
  DUPLICATE_TARGET: 500,
};

export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

/** Server-side faults that must be logged at error level */
export const isServerFault = (error: AppError): boolean => httpStatus(error.code) >= 500;

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

export const badRequest = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.BAD_REQUEST, msg, details);

export const notFound = (resource: string): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`);

export const validation = (details: Record<string, unknown>): AppError =>
  appError(ErrorCode.VALIDATION, "Validation failed", details);

export const cancelled = (msg = "Request was cancelled"): AppError =>
  appError(ErrorCode.CANCELLED, msg);

export const internal = (msg = "Internal server error", cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, msg, undefined, cause);

export const protocolViolation = (path: string): AppError =>
  appError(
    ErrorCode.PROTOCOL_VIOLATION,
    `${path} is only reachable through fragment requests`,
    { path },
  );

export const renderFailed = (template: string, cause?: unknown): AppError =>
  appError(ErrorCode.RENDER_FAILED, `Failed to render template "${template}"`, { template }, cause);

export const duplicateTarget = (targetId: string): AppError =>
  appError(
    ErrorCode.DUPLICATE_TARGET,
    `Fragment target "${targetId}" appears more than once in one response`,
    { targetId },
  );

/** Best-effort message for logging an unknown cause */
export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
