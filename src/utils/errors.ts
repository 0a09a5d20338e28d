// Standardized error handling utilities
// One code per failure class; each maps to an HTTP status and a CLI exit code

export enum ErrorCode {
  MISSING_CREDENTIAL = 'missing_credential',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  TRANSIENT_TRANSPORT = 'transient_transport',
  MALFORMED_RESPONSE = 'malformed_response',
  PROVIDER_ERROR = 'provider_error',
  BAD_REQUEST = 'bad_request',
  NOT_FOUND = 'not_found',
  CANCELLED = 'cancelled',
  INTERNAL_ERROR = 'internal_error',
}

export const EXIT_CODES: Record<ErrorCode, number> = {
  [ErrorCode.PROVIDER_ERROR]: 1,
  [ErrorCode.INTERNAL_ERROR]: 1,
  [ErrorCode.MISSING_CREDENTIAL]: 2,
  [ErrorCode.BAD_REQUEST]: 3,
  [ErrorCode.NOT_FOUND]: 3,
  [ErrorCode.MALFORMED_RESPONSE]: 4,
  [ErrorCode.TRANSIENT_TRANSPORT]: 5,
  [ErrorCode.SERVICE_UNAVAILABLE]: 6,
  [ErrorCode.CANCELLED]: 130,
};

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  static missingCredential(name: string): AppError {
    return new AppError(ErrorCode.MISSING_CREDENTIAL, `${name} is not configured`, 401);
  }

  static serviceUnavailable(message: string = 'Service not available', details?: unknown): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503, details);
  }

  static transientTransport(message: string, cause?: unknown): AppError {
    return new AppError(ErrorCode.TRANSIENT_TRANSPORT, message, 504, undefined, { cause });
  }

  static malformedResponse(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.MALFORMED_RESPONSE, message, 502, details);
  }

  static providerError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.PROVIDER_ERROR, message, 502, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static cancelled(message: string = 'Request cancelled'): AppError {
    return new AppError(ErrorCode.CANCELLED, message, 499);
  }

  static internal(message: string = 'Internal error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: string;
  code: ErrorCode;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.message,
    code: error.code,
  };

  if (includeDetails && error.details !== undefined) {
    response.details = error.details;
  }

  return response;
}

// "Error: [transient_transport] Claude API request timed out"
export function formatErrorLine(error: AppError): string {
  return `Error: [${error.code}] ${error.message}`;
}

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function errorCodeOf(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) return undefined;
  const { code } = value;
  return typeof code === 'string' ? code : undefined;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * True for failures where the request never produced an HTTP response:
 * timeouts, refused or reset connections, DNS failures.
 * Callers must check cancellation first; an AbortError is not transient.
 */
export function isTransientTransportError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.code === ErrorCode.TRANSIENT_TRANSPORT;
  }
  if (isTimeoutError(error)) return true;
  if (!(error instanceof Error)) return false;

  const code = errorCodeOf(error) ?? errorCodeOf(error.cause);
  if (code && TRANSIENT_CODES.has(code)) return true;

  // undici reports connection-level failures as TypeError("fetch failed")
  return error instanceof TypeError && error.message === 'fetch failed';
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (isAbortError(error)) return AppError.cancelled();
  if (isTransientTransportError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return AppError.transientTransport(message, error);
  }
  if (error instanceof SyntaxError) {
    return AppError.malformedResponse(error.message);
  }
  if (!(error instanceof Error)) {
    return AppError.internal(String(error));
  }
  const message = `${error.name}: ${error.message}`;
  // Bugs in our own code, not failures reported by a remote service
  if (error instanceof TypeError || error instanceof ReferenceError || error instanceof RangeError) {
    return AppError.internal(message);
  }
  return AppError.providerError(message);
}
