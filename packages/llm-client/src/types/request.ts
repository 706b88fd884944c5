/**
 * Request and response types for chat completion calls.
 */

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export type ChatRole = "system" | "developer" | "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export function systemMessage(content: string): ChatMessage {
  return { role: "system", content };
}

export function userMessage(content: string): ChatMessage {
  return { role: "user", content };
}

// ---------------------------------------------------------------------------
// CompletionRequest
// ---------------------------------------------------------------------------

/**
 * The single input type for `complete()`.
 *
 * Sampling parameters are optional on purpose: reasoning models reject
 * `temperature` and take `max_completion_tokens` instead of `max_tokens`,
 * so callers set exactly the fields their model accepts.
 */
export interface CompletionRequest {
  /** Provider's model ID (for Azure: the deployment name). */
  readonly model: string;
  readonly messages: readonly ChatMessage[];
  /** Uses the client's default provider if omitted. */
  readonly provider?: string;
  readonly temperature?: number;
  readonly max_tokens?: number;
  readonly max_completion_tokens?: number;
  /** Reasoning models only ("low", "medium" or "high"). */
  readonly reasoning_effort?: string;
  /** Per-request timeout in milliseconds. */
  readonly timeout_ms?: number;
  /** Caller cancellation. */
  readonly signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// CompletionResponse
// ---------------------------------------------------------------------------

export type FinishReason =
  | "stop"
  | "length"
  | "content_filter"
  | "tool_calls"
  | "other";

export interface Usage {
  readonly input_tokens: number;
  readonly output_tokens: number;
}

export interface CompletionResponse {
  readonly id: string;
  readonly model: string;
  readonly provider: string;
  /** Concatenated assistant text. Empty string when the model returned none. */
  readonly text: string;
  readonly finish_reason: FinishReason;
  readonly usage: Usage;
}
