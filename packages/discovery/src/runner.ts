/**
 * DiscoveryRunner: the main entry point for running procurement discovery.
 *
 * Wires configuration, the shared concurrency limiter, the LLM and search
 * adapters, the stage handlers and the orchestrator.
 */

import { ConcurrencyLimiter } from "@procurement-scout/llm-client";
import type { AppConfig } from "./config.js";
import { createLlmClient, TieredLlmAdapter, type LlmAdapter } from "./adapters/llm-adapter.js";
import { TavilySearchClient, type SearchClient } from "./adapters/search-client.js";
import type { PipelineEvent } from "./engine/events.js";
import { Orchestrator } from "./engine/orchestrator.js";
import { DEFAULT_BACKOFF, type BackoffConfig } from "./engine/retry.js";
import { loadCheckpoint } from "./state/checkpoint.js";
import type { ProcurementRequest } from "./state/types.js";
import { WorkflowState } from "./state/workflow-state.js";
import { BenchmarkStage } from "./stages/benchmark.js";
import { ClarifyStage } from "./stages/clarify.js";
import { DescribeStage } from "./stages/describe.js";
import { ReportStage } from "./stages/report.js";
import { SearchStage } from "./stages/search.js";
import type { StageDeps, StageHandlers } from "./stages/stage.js";

// ---------- Config Types ----------

export interface RunnerConfig {
  /** LLM backend. Built from `config.llm` if not set. */
  llm?: LlmAdapter;
  /** Search backend. Built from `config.search` if not set. */
  search?: SearchClient;
  /** Event listener callback. */
  onEvent?: (event: PipelineEvent) => void;
  /** Write a checkpoint here after every stage attempt. */
  checkpointPath?: string;
  backoff?: BackoffConfig;
  /** Whether to actually sleep during retries. Default true. */
  enableSleep?: boolean;
}

export function createStageHandlers(deps: StageDeps): StageHandlers {
  return {
    clarify: new ClarifyStage(deps),
    describe: new DescribeStage(deps),
    search: new SearchStage(deps),
    benchmark: new BenchmarkStage(deps),
    report: new ReportStage(),
  };
}

// ---------- DiscoveryRunner ----------

export class DiscoveryRunner {
  private readonly orchestrator: Orchestrator;

  constructor(config: Readonly<AppConfig>, options: RunnerConfig = {}) {
    const limiter = new ConcurrencyLimiter(config.workflow.maxConcurrentRequests);
    const llm =
      options.llm ?? new TieredLlmAdapter(createLlmClient(config.llm, limiter), config.llm);
    const search = options.search ?? TavilySearchClient.fromConfig(config.search, limiter);

    this.orchestrator = new Orchestrator({
      handlers: createStageHandlers({ llm, search, config }),
      tiers: config.tiers,
      retry: {
        maxRetries: config.workflow.maxRetries,
        backoff: options.backoff ?? DEFAULT_BACKOFF,
      },
      timeoutMs: config.workflow.timeoutMs,
      ...(options.checkpointPath ? { checkpointPath: options.checkpointPath } : {}),
      ...(options.onEvent ? { onEvent: options.onEvent } : {}),
      ...(options.enableSleep !== undefined ? { enableSleep: options.enableSleep } : {}),
    });
  }

  /** Run a new request to a terminal state. */
  run(request: ProcurementRequest): Promise<WorkflowState> {
    const details = request.details?.trim();
    return this.orchestrator.run({
      serviceName: request.serviceName.trim(),
      country: request.country.trim(),
      ...(details ? { details } : {}),
    });
  }

  /** Continue the run saved at `checkpointPath`. */
  resume(checkpointPath: string): Promise<WorkflowState> {
    const checkpoint = loadCheckpoint(checkpointPath);
    return this.orchestrator.resume(WorkflowState.fromSnapshot(checkpoint.snapshot));
  }
}
