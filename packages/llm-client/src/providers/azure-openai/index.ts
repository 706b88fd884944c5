/**
 * Azure OpenAI adapter.
 *
 * Same Chat Completions dialect as OpenAI, addressed per deployment:
 * `{endpoint}/openai/deployments/{deployment}/chat/completions?api-version=...`
 * with an `api-key` header. `request.model` names the deployment.
 */

import type { ChatAdapter } from "../adapter.js";
import type { CompletionRequest, CompletionResponse } from "../../types/index.js";
import { ConfigurationError } from "../../types/index.js";
import { httpPost, mapHttpError, mergeHeaders } from "../../utils/index.js";
import { translateRequest } from "../openai-compatible/translate-request.js";
import { translateResponse } from "../openai-compatible/translate-response.js";

export const DEFAULT_AZURE_API_VERSION = "2024-02-15-preview";

export interface AzureOpenAIAdapterOptions {
  apiKey: string;
  /** Resource endpoint, e.g. https://my-resource.openai.azure.com */
  endpoint: string;
  apiVersion?: string;
  timeoutMs?: number;
}

export class AzureOpenAIAdapter implements ChatAdapter {
  readonly name = "azure_openai";
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly apiVersion: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: AzureOpenAIAdapterOptions) {
    if (!options.endpoint) {
      throw new ConfigurationError("Azure OpenAI requires an endpoint", {
        provider: "azure_openai",
      });
    }
    this.apiKey = options.apiKey;
    this.endpoint = options.endpoint.replace(/\/$/, "");
    this.apiVersion = options.apiVersion ?? DEFAULT_AZURE_API_VERSION;
    this.timeoutMs = options.timeoutMs;
  }

  /** Build the deployment URL for a model. */
  urlFor(deployment: string): string {
    const version = encodeURIComponent(this.apiVersion);
    return `${this.endpoint}/openai/deployments/${encodeURIComponent(deployment)}/chat/completions?api-version=${version}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    // The deployment is in the URL; Azure ignores `model` in the body.
    const body = translateRequest(request);
    const headers = mergeHeaders({ "api-key": this.apiKey });

    const httpRes = await httpPost(this.urlFor(request.model), body, headers, {
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
