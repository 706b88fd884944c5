/**
 * Client: routes completion requests to provider adapters and applies
 * middleware in an onion pattern.
 */

import type { ChatAdapter } from "./providers/adapter.js";
import type { CompletionRequest, CompletionResponse } from "./types/request.js";
import { ConfigurationError } from "./types/errors.js";
import type { ConcurrencyLimiter } from "./utils/concurrency.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Middleware for `complete()` calls.
 *
 * Runs in registration order for the request phase and in reverse order for
 * the response phase.
 */
export type Middleware = (
  request: CompletionRequest,
  next: (request: CompletionRequest) => Promise<CompletionResponse>,
) => Promise<CompletionResponse>;

export interface ClientConfig {
  /** Named provider adapters. */
  providers?: Record<string, ChatAdapter>;
  /** Key into `providers` to use when `request.provider` is omitted. */
  defaultProvider?: string;
  /** Middleware chain for `complete()` calls. */
  middleware?: Middleware[];
}

/**
 * Middleware that holds a limiter slot for the duration of each request.
 * Register it last so outer middleware does not hold a slot while it works.
 */
export function concurrencyMiddleware(limiter: ConcurrencyLimiter): Middleware {
  return (request, next) => limiter.run(() => next(request));
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class Client {
  private readonly providers: Record<string, ChatAdapter>;
  private readonly defaultProvider: string | undefined;
  private readonly middleware: Middleware[];

  constructor(config: ClientConfig) {
    this.providers = { ...(config.providers ?? {}) };
    this.defaultProvider = config.defaultProvider;
    this.middleware = [...(config.middleware ?? [])];
  }

  /** Names of the registered providers. */
  get providerNames(): string[] {
    return Object.keys(this.providers);
  }

  /**
   * Resolve the adapter for a given request.
   *
   * @throws {ConfigurationError} on any routing failure.
   */
  private resolveAdapter(request: CompletionRequest): ChatAdapter {
    const providerName = request.provider ?? this.defaultProvider;

    if (!providerName) {
      throw new ConfigurationError(
        "No provider specified in request and no default provider configured",
      );
    }

    const adapter = this.providers[providerName];
    if (!adapter) {
      throw new ConfigurationError(
        `Provider "${providerName}" is not registered`,
      );
    }

    return adapter;
  }

  /**
   * Blocking call through the middleware chain to the resolved adapter.
   *
   * Does NOT retry. Raises on errors.
   */
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const adapter = this.resolveAdapter(request);

    const innermost = (req: CompletionRequest): Promise<CompletionResponse> =>
      adapter.complete(req);

    // First registered middleware is the outermost.
    const chain = this.middleware.reduceRight<
      (req: CompletionRequest) => Promise<CompletionResponse>
    >((next, mw) => (req: CompletionRequest) => mw(req, next), innermost);

    return chain(request);
  }
}
