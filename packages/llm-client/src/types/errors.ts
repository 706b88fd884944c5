/**
 * Error hierarchy for backend transport.
 *
 * Everything that goes wrong between us and a remote backend (LLM provider or
 * search API) surfaces as a TransportError. The `retryable` flag is the only
 * thing the orchestrator looks at when deciding whether to try again.
 */

// ---------------------------------------------------------------------------
// TransportError: base for all backend failures
// ---------------------------------------------------------------------------

export interface TransportErrorOptions {
  /** Which backend raised the error ("openai", "azure_openai", "tavily"...). */
  provider?: string;
  /** HTTP status code, if the failure came from a response. */
  statusCode?: number;
  /** Backend-specific error code. */
  errorCode?: string;
  /** Seconds the backend asked us to wait before retrying. */
  retryAfter?: number;
  /** Raw error body from the backend. */
  raw?: Record<string, unknown>;
  cause?: unknown;
}

export class TransportError extends Error {
  /** Whether this error is safe to retry. */
  readonly retryable: boolean;
  readonly provider: string | undefined;
  readonly statusCode: number | undefined;
  readonly errorCode: string | undefined;
  readonly retryAfter: number | undefined;
  readonly raw: Record<string, unknown> | undefined;

  constructor(
    message: string,
    options: TransportErrorOptions & { retryable?: boolean } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.retryable = options.retryable ?? false;
    this.provider = options.provider;
    this.statusCode = options.statusCode;
    this.errorCode = options.errorCode;
    this.retryAfter = options.retryAfter;
    this.raw = options.raw;
  }
}

// ---------------------------------------------------------------------------
// Non-retryable
// ---------------------------------------------------------------------------

/** 401: invalid or expired credentials. */
export class AuthenticationError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 403: credentials lack permission. */
export class AccessDeniedError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "AccessDeniedError";
  }
}

/** 404: unknown model, deployment or endpoint. */
export class NotFoundError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "NotFoundError";
  }
}

/** 400/413/422: malformed request or unsupported parameter. */
export class InvalidRequestError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** Request cancelled through its abort signal. */
export class AbortError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "AbortError";
  }
}

/** Client misconfiguration (unknown provider, missing endpoint). */
export class ConfigurationError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "ConfigurationError";
  }
}

// ---------------------------------------------------------------------------
// Retryable
// ---------------------------------------------------------------------------

/** 429: rate limit exceeded. */
export class RateLimitError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
  }
}

/** 5xx: backend internal error. */
export class ServerError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: true });
    this.name = "ServerError";
  }
}

/** 408 or a per-request timeout elapsed. */
export class RequestTimeoutError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: true });
    this.name = "RequestTimeoutError";
  }
}

/** DNS failure, refused or reset connection. */
export class NetworkError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { ...options, retryable: true });
    this.name = "NetworkError";
  }
}

/** Narrowing helper for code that receives `unknown` from a catch clause. */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
