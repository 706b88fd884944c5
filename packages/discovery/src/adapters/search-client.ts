/**
 * Web search adapter backed by the Tavily search API.
 */

import { z } from "zod";
import {
  httpPost,
  mapHttpError,
  mergeHeaders,
  type ConcurrencyLimiter,
} from "@procurement-scout/llm-client";
import type { SearchConfig } from "../config.js";
import { ParseError } from "../errors.js";
import type { SearchHit } from "../state/types.js";

/** What a query is looking for. */
export type SearchKind = "vendor" | "partner" | "pricing";

export interface SearchOptions {
  kind?: SearchKind;
  signal?: AbortSignal;
}

export interface SearchClient {
  /**
   * Run one query. Never returns more than `maxResults` hits.
   *
   * @throws {TransportError} on backend failures.
   * @throws {ParseError} when the backend answers with an unexpected shape.
   */
  search(query: string, maxResults: number, options?: SearchOptions): Promise<SearchHit[]>;
}

export const TAVILY_SEARCH_URL = "https://api.tavily.com/search";

/** Sources each kind of query is narrowed to. Untyped queries search the whole web. */
export const KIND_DOMAINS: Readonly<Record<SearchKind, readonly string[]>> = {
  vendor: ["linkedin.com", "bloomberg.com", "reuters.com", "crunchbase.com", "g2.com", "capterra.com"],
  partner: ["partnerdirectory.com", "yellowpages.com", "chambers.com", "linkedin.com"],
  pricing: ["gartner.com", "forrester.com", "idc.com", "marketresearch.com"],
};

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(""),
        url: z.string(),
        content: z.string().default(""),
      }),
    )
    .default([]),
});

export interface TavilySearchClientOptions {
  apiKey: string;
  timeoutMs?: number;
  url?: string;
  /** Shared global request ceiling. */
  limiter?: ConcurrencyLimiter;
}

export class TavilySearchClient implements SearchClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number | undefined;
  private readonly url: string;
  private readonly limiter: ConcurrencyLimiter | undefined;

  constructor(options: TavilySearchClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.url = options.url ?? TAVILY_SEARCH_URL;
    this.limiter = options.limiter;
  }

  static fromConfig(config: SearchConfig, limiter?: ConcurrencyLimiter): TavilySearchClient {
    return new TavilySearchClient({
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
      ...(limiter ? { limiter } : {}),
    });
  }

  async search(query: string, maxResults: number, options: SearchOptions = {}): Promise<SearchHit[]> {
    const { kind, signal } = options;
    const body = {
      query,
      max_results: maxResults,
      search_depth: "basic",
      include_answer: false,
      ...(kind ? { include_domains: KIND_DOMAINS[kind] } : {}),
    };
    const send = () =>
      httpPost(this.url, body, mergeHeaders({ Authorization: `Bearer ${this.apiKey}` }), {
        timeout: this.timeoutMs,
        signal,
        provider: "tavily",
      });
    const res = await (this.limiter ? this.limiter.run(send) : send());

    if (res.status < 200 || res.status >= 300) {
      throw mapHttpError(res.status, res.body ?? res.text, "tavily", res.headers);
    }

    const parsed = tavilyResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new ParseError("Search backend returned an unexpected response", {
        raw: res.text,
        cause: parsed.error,
      });
    }

    // Truncate rather than fail when the backend ignores the cap.
    return parsed.data.results.slice(0, maxResults).map((r) => ({
      title: r.title,
      url: r.url,
      snippet: r.content,
    }));
  }
}
