/**
 * OpenAI-compatible provider adapter for the Chat Completions API.
 *
 * Covers api.openai.com and any endpoint that speaks the same
 * `/v1/chat/completions` dialect.
 */

import type { ChatAdapter } from "../adapter.js";
import type { CompletionRequest, CompletionResponse } from "../../types/index.js";
import { httpPost, mapHttpError, mergeHeaders } from "../../utils/index.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

export interface OpenAICompatibleAdapterOptions {
  apiKey: string;
  baseUrl?: string;
  /** Default per-request timeout in milliseconds. */
  timeoutMs?: number;
}

export class OpenAICompatibleAdapter implements ChatAdapter {
  readonly name = "openai";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: OpenAICompatibleAdapterOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com").replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }
    return mergeHeaders(headers);
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const body = translateRequest(request);
    const url = `${this.baseUrl}/v1/chat/completions`;

    const httpRes = await httpPost(url, body, this.buildHeaders(), {
      timeout: request.timeout_ms ?? this.timeoutMs,
      signal: request.signal,
      provider: this.name,
    });

    if (httpRes.status < 200 || httpRes.status >= 300) {
      throw mapHttpError(httpRes.status, httpRes.body ?? httpRes.text, this.name, httpRes.headers);
    }

    return translateResponse(httpRes.body, this.name);
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
