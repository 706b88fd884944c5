/**
 * Barrel re-export for all type modules.
 */

export type {
  ChatRole,
  ChatMessage,
  CompletionRequest,
  CompletionResponse,
  FinishReason,
  Usage,
} from "./request.js";
export { systemMessage, userMessage } from "./request.js";

export type { TransportErrorOptions } from "./errors.js";
export {
  TransportError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  AbortError,
  ConfigurationError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  NetworkError,
  isTransportError,
} from "./errors.js";
