/**
 * Thin HTTP wrapper around the native `fetch` API.
 *
 * Every backend adapter (LLM providers and the search client) posts JSON
 * through `httpPost`. Failures that never produced a response are turned into
 * typed transport errors here; non-2xx responses are left to the caller and
 * `mapHttpError`.
 */

import {
  AbortError,
  NetworkError,
  RequestTimeoutError,
} from "../types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved response from an HTTP request. */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body (or `undefined` if response was not valid JSON). */
  body: unknown;
  /** Raw response text. */
  text: string;
}

export interface HttpRequestOptions {
  /** Request timeout in milliseconds. Combined with any user-provided signal. */
  timeout?: number;
  /** Optional caller-provided abort signal. */
  signal?: AbortSignal;
  /** Backend name attached to any error raised. */
  provider?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

interface CombinedSignal {
  signal: AbortSignal | undefined;
  timeoutSignal: AbortSignal | undefined;
}

function buildSignal(options?: HttpRequestOptions): CombinedSignal {
  const signals: AbortSignal[] = [];
  let timeoutSignal: AbortSignal | undefined;

  if (options?.signal) {
    signals.push(options.signal);
  }

  if (options?.timeout != null && options.timeout > 0) {
    timeoutSignal = AbortSignal.timeout(options.timeout);
    signals.push(timeoutSignal);
  }

  if (signals.length === 0) return { signal: undefined, timeoutSignal };
  if (signals.length === 1) return { signal: signals[0], timeoutSignal };
  return { signal: AbortSignal.any(signals), timeoutSignal };
}

/**
 * Classify a rejection from `fetch` (or from reading its body).
 *
 * The caller's own signal wins over the timeout: a cancelled run must not
 * be reported as a retryable timeout.
 */
function classifyFetchFailure(
  error: unknown,
  url: string,
  options: HttpRequestOptions | undefined,
  timeoutSignal: AbortSignal | undefined,
): Error {
  const provider = options?.provider;
  if (options?.signal?.aborted) {
    return new AbortError(`Request to ${url} was aborted`, {
      provider,
      cause: error,
    });
  }
  if (timeoutSignal?.aborted) {
    return new RequestTimeoutError(
      `Request to ${url} timed out after ${options?.timeout ?? 0}ms`,
      { provider, cause: error },
    );
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Request to ${url} failed: ${detail}`, {
    provider,
    cause: error,
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return the parsed response.
 *
 * On non-2xx status codes the promise still resolves; it is the caller's
 * responsibility to inspect `status` and map it to an error.
 *
 * @throws {AbortError} when the caller's signal fired.
 * @throws {RequestTimeoutError} when `timeout` elapsed first.
 * @throws {NetworkError} on DNS, connection or socket failures.
 */
export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const merged = mergeHeaders(headers);
  const { signal, timeoutSignal } = buildSignal(options);

  let res: Response;
  let text: string;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: merged,
      body: JSON.stringify(body),
      signal,
    });
    text = await res.text();
  } catch (error) {
    throw classifyFetchFailure(error, url, options, timeoutSignal);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = undefined;
  }

  return {
    status: res.status,
    headers: res.headers,
    body: parsed,
    text,
  };
}
