/**
 * LLM adapter: one calling convention over the standard and reasoning model
 * configurations.
 */

import {
  AzureOpenAIAdapter,
  Client,
  OpenAICompatibleAdapter,
  concurrencyMiddleware,
  systemMessage,
  userMessage,
  type ChatAdapter,
  type CompletionRequest,
  type ConcurrencyLimiter,
} from "@procurement-scout/llm-client";
import type { LlmConfig } from "../config.js";
import { ModelTier } from "../state/types.js";

export interface LlmAdapter {
  /**
   * Send one prompt and return the model's text.
   *
   * @throws {TransportError} on backend failures; `retryable` tells which.
   */
  complete(
    tier: ModelTier,
    prompt: string,
    maxTokens?: number,
    signal?: AbortSignal,
  ): Promise<string>;
}

const SYSTEM_PROMPT =
  "You are a procurement research analyst. Answer with a single JSON object " +
  "and nothing else unless the prompt asks otherwise.";

/** Build a Client for the configured provider, sharing `limiter` if given. */
export function createLlmClient(config: LlmConfig, limiter?: ConcurrencyLimiter): Client {
  const adapter: ChatAdapter =
    config.provider === "azure_openai"
      ? new AzureOpenAIAdapter({
          apiKey: config.apiKey,
          endpoint: config.azureEndpoint ?? "",
          apiVersion: config.azureApiVersion,
          timeoutMs: config.timeoutMs,
        })
      : new OpenAICompatibleAdapter({
          apiKey: config.apiKey,
          baseUrl: config.baseUrl,
          timeoutMs: config.timeoutMs,
        });

  return new Client({
    providers: { [adapter.name]: adapter },
    defaultProvider: adapter.name,
    middleware: limiter ? [concurrencyMiddleware(limiter)] : [],
  });
}

export class TieredLlmAdapter implements LlmAdapter {
  constructor(
    private readonly client: Client,
    private readonly config: LlmConfig,
  ) {}

  /**
   * Apply the tier's parameter rules. Reasoning models reject `temperature`
   * and budget output through `max_completion_tokens`.
   */
  buildRequest(
    tier: ModelTier,
    prompt: string,
    maxTokens?: number,
    signal?: AbortSignal,
  ): CompletionRequest {
    const messages = [systemMessage(SYSTEM_PROMPT), userMessage(prompt)];
    const common = {
      messages,
      timeout_ms: this.config.timeoutMs,
      ...(signal ? { signal } : {}),
    };

    if (tier === ModelTier.REASONING) {
      return {
        ...common,
        model: this.config.reasoningModel,
        max_completion_tokens: maxTokens ?? this.config.reasoningMaxTokens,
      };
    }
    return {
      ...common,
      model: this.config.standardModel,
      temperature: this.config.temperature,
      max_tokens: maxTokens ?? this.config.maxTokens,
    };
  }

  async complete(
    tier: ModelTier,
    prompt: string,
    maxTokens?: number,
    signal?: AbortSignal,
  ): Promise<string> {
    const response = await this.client.complete(
      this.buildRequest(tier, prompt, maxTokens, signal),
    );
    return response.text;
  }
}
