/**
 * ChatAdapter interface: the contract every provider must implement.
 */

import type { CompletionRequest, CompletionResponse } from "../types/index.js";

/**
 * Translates between the unified CompletionRequest/CompletionResponse types
 * and one provider's native chat completions API.
 */
export interface ChatAdapter {
  /** Provider name, e.g. "openai", "azure_openai". */
  readonly name: string;

  /** Send a request and block until the model finishes. */
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
