/**
 * Application error taxonomy for the search gateway.
 *
 * Every error carries a stable machine-readable code, a human message, optional
 * details and an optional cause. The HTTP status is derived from the code; the
 * cause is kept for logs and never serialized to clients.
 */
export const ErrorCode = {
  DOCUMENT_NOT_FOUND: "DOCUMENT_NOT_FOUND",
  DOCUMENT_EXISTS: "DOCUMENT_EXISTS",
  INVALID_DOCUMENT: "INVALID_DOCUMENT",
  DOCUMENT_CREATE_FAILED: "DOCUMENT_CREATE_FAILED",
  DOCUMENT_UPDATE_FAILED: "DOCUMENT_UPDATE_FAILED",
  DOCUMENT_DELETE_FAILED: "DOCUMENT_DELETE_FAILED",

  SEARCH_FAILED: "SEARCH_FAILED",
  INVALID_QUERY: "INVALID_QUERY",
  SEARCH_TIMEOUT: "SEARCH_TIMEOUT",

  INDEX_NOT_FOUND: "INDEX_NOT_FOUND",
  INDEX_EXISTS: "INDEX_EXISTS",
  INDEX_CREATE_FAILED: "INDEX_CREATE_FAILED",
  INDEX_DELETE_FAILED: "INDEX_DELETE_FAILED",
  INVALID_MAPPING: "INVALID_MAPPING",

  VALIDATION_FAILED: "VALIDATION_FAILED",
  INVALID_REQUEST: "INVALID_REQUEST",
  MISSING_PARAMETER: "MISSING_PARAMETER",
  INVALID_PARAMETER: "INVALID_PARAMETER",
  ROUTE_NOT_FOUND: "ROUTE_NOT_FOUND",

  ELASTICSEARCH_DOWN: "ELASTICSEARCH_DOWN",
  CONNECTION_FAILED: "CONNECTION_FAILED",
  TIMEOUT: "TIMEOUT",
  INTERNAL_ERROR: "INTERNAL_ERROR",

  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
  AUTHENTICATION_FAILED: "AUTHENTICATION_FAILED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export interface AppErrorOptions {
  details?: string;
  cause?: unknown;
  metadata?: AppErrorMetadata;
  statusCode?: number;
}

export function statusForCode(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.DOCUMENT_NOT_FOUND:
    case ErrorCode.INDEX_NOT_FOUND:
    case ErrorCode.ROUTE_NOT_FOUND:
      return 404;
    case ErrorCode.DOCUMENT_EXISTS:
    case ErrorCode.INDEX_EXISTS:
      return 409;
    case ErrorCode.VALIDATION_FAILED:
    case ErrorCode.INVALID_REQUEST:
    case ErrorCode.MISSING_PARAMETER:
    case ErrorCode.INVALID_PARAMETER:
    case ErrorCode.INVALID_QUERY:
    case ErrorCode.INVALID_DOCUMENT:
    case ErrorCode.INVALID_MAPPING:
      return 400;
    case ErrorCode.UNAUTHORIZED:
    case ErrorCode.AUTHENTICATION_FAILED:
      return 401;
    case ErrorCode.FORBIDDEN:
      return 403;
    case ErrorCode.TIMEOUT:
    case ErrorCode.SEARCH_TIMEOUT:
      return 408;
    case ErrorCode.ELASTICSEARCH_DOWN:
    case ErrorCode.CONNECTION_FAILED:
      return 503;
    default:
      return 500;
  }
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details: string | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    code: ErrorCode,
    message: string,
    options: AppErrorOptions = {},
    type: AppErrorType = "AppError"
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.type = type;
    this.code = code;
    this.statusCode = options.statusCode ?? statusForCode(code);
    this.details = options.details;
    this.metadata = options.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Not-found, already-exists and failed-operation errors raised by the domain. */
export class DomainError extends AppError {
  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(code, message, options, "DomainError");
  }
}

/** Failures of the backend connection itself. */
export class InfrastructureError extends AppError {
  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(code, message, options, "InfrastructureError");
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    options: AppErrorOptions & {
      code?: Extract<
        ErrorCode,
        | "VALIDATION_FAILED"
        | "INVALID_REQUEST"
        | "MISSING_PARAMETER"
        | "INVALID_PARAMETER"
      >;
    } = {}
  ) {
    super(
      options.code ?? ErrorCode.VALIDATION_FAILED,
      message,
      options,
      "ValidationError"
    );
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Attaches an operation-specific code to a failure. Errors that already carry
 * an application code pass through untouched.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode,
  message: string
): AppError {
  if (isAppError(error)) {
    return error;
  }

  return new DomainError(code, message, { cause: error });
}

export function documentNotFound(index: string, id: string): DomainError {
  return new DomainError(
    ErrorCode.DOCUMENT_NOT_FOUND,
    `Document not found: ${index}/${id}`
  );
}

export function documentExists(index: string, id: string): DomainError {
  return new DomainError(
    ErrorCode.DOCUMENT_EXISTS,
    `Document already exists: ${index}/${id}`
  );
}

export function indexNotFound(index: string): DomainError {
  return new DomainError(ErrorCode.INDEX_NOT_FOUND, `Index not found: ${index}`);
}

export function indexExists(index: string): DomainError {
  return new DomainError(ErrorCode.INDEX_EXISTS, `Index already exists: ${index}`);
}
