/**
 * Barrel re-export for all provider adapters.
 */

// Adapter interface
export type { ChatAdapter } from "./adapter.js";

// OpenAI and compatible endpoints (Chat Completions API)
export {
  OpenAICompatibleAdapter,
  translateRequest,
  translateResponse,
} from "./openai-compatible/index.js";
export type { OpenAICompatibleAdapterOptions } from "./openai-compatible/index.js";
export type {
  ChatCompletionMessage,
  ChatCompletionRequestBody,
} from "./openai-compatible/translate-request.js";

// Azure OpenAI
export {
  AzureOpenAIAdapter,
  DEFAULT_AZURE_API_VERSION,
} from "./azure-openai/index.js";
export type { AzureOpenAIAdapterOptions } from "./azure-openai/index.js";
