/**
 * Maps HTTP error responses from a backend to the typed transport errors.
 */

import {
  TransportError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  type TransportErrorOptions,
} from "../types/index.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/** Try to extract a human-readable error message from a response body. */
function extractMessage(body: unknown, fallback: string): string {
  if (isRecord(body)) {
    const nested = body["error"];
    // OpenAI and Azure nest under `error.message`.
    if (isRecord(nested) && typeof nested["message"] === "string") {
      return nested["message"];
    }
    if (typeof body["message"] === "string") return body["message"];
    // Tavily uses `detail`, sometimes as `{ error: "..." }`.
    const detail = body["detail"];
    if (typeof detail === "string") return detail;
    if (isRecord(detail) && typeof detail["error"] === "string") {
      return detail["error"];
    }
    if (typeof nested === "string") return nested;
  }

  if (typeof body === "string" && body.length > 0) return body;
  return fallback;
}

function extractErrorCode(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;

  const nested = body["error"];
  if (isRecord(nested)) {
    if (typeof nested["code"] === "string") return nested["code"];
    if (typeof nested["type"] === "string") return nested["type"];
  }
  if (typeof body["code"] === "string") return body["code"];
  return undefined;
}

/**
 * Parse the `Retry-After` header. Only the integer-seconds form is handled;
 * HTTP-dates are uncommon for these APIs.
 */
function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;

  const seconds = parseFloat(raw);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return seconds;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a typed `TransportError`.
 *
 * @param status   - HTTP status code from the response.
 * @param body     - Parsed JSON body (or raw text) from the response.
 * @param provider - Backend name (e.g. "openai", "tavily").
 * @param headers  - Response headers (used to extract Retry-After).
 */
export function mapHttpError(
  status: number,
  body: unknown,
  provider: string,
  headers?: Headers,
): TransportError {
  const message = extractMessage(body, `${provider} returned HTTP ${status}`);
  const opts: TransportErrorOptions = {
    provider,
    statusCode: status,
    errorCode: extractErrorCode(body),
    retryAfter: parseRetryAfter(headers),
    raw: isRecord(body) ? body : undefined,
  };

  switch (status) {
    case 400:
    case 413:
    case 422:
      return new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 408:
      return new RequestTimeoutError(message, opts);
    case 429:
      return new RateLimitError(message, opts);
    case 500:
    case 502:
    case 503:
    case 504:
      return new ServerError(message, opts);
  }

  // Other 4xx (402, 409, Tavily's 432/433 plan limits) cannot succeed on retry.
  return new TransportError(message, { ...opts, retryable: status >= 500 });
}
