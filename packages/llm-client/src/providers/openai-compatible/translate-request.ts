/**
 * Translate a CompletionRequest into the Chat Completions wire format.
 */

import type { CompletionRequest } from "../../types/index.js";

export interface ChatCompletionMessage {
  role: "system" | "developer" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  temperature?: number;
  max_tokens?: number;
  max_completion_tokens?: number;
  reasoning_effort?: string;
}

export function translateRequest(request: CompletionRequest): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    model: request.model,
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
  };

  if (request.temperature !== undefined) {
    body.temperature = request.temperature;
  }
  if (request.max_tokens !== undefined) {
    body.max_tokens = request.max_tokens;
  }
  if (request.max_completion_tokens !== undefined) {
    body.max_completion_tokens = request.max_completion_tokens;
  }
  if (request.reasoning_effort !== undefined) {
    body.reasoning_effort = request.reasoning_effort;
  }

  return body;
}
