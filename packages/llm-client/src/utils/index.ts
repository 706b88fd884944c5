/**
 * Barrel re-export for transport utility modules.
 */

// HTTP client wrapper
export { httpPost, mergeHeaders } from "./http.js";
export type { HttpResponse, HttpRequestOptions } from "./http.js";

// Error mapping utility
export { mapHttpError, isRecord } from "./error-mapping.js";

// Concurrency limiting
export { ConcurrencyLimiter } from "./concurrency.js";
