// Public API of @procurement-scout/discovery

// State
export {
  STAGE_NAMES,
  RunStatus,
  AttemptStatus,
  ModelTier,
} from "./state/types.js";
export type {
  StageName,
  ProcurementRequest,
  ClarifiedRequest,
  ServiceDescription,
  Vendor,
  Partner,
  SearchHit,
  SearchMetadata,
  PriceBenchmark,
  Report,
  StageOutputs,
  StageOutput,
  ErrorKind,
  ErrorRecord,
  StageHistoryEntry,
} from "./state/types.js";
export { WorkflowState } from "./state/workflow-state.js";
export type { WorkflowSnapshot, AttemptDetails } from "./state/workflow-state.js";
export { createCheckpoint, saveCheckpoint, loadCheckpoint } from "./state/checkpoint.js";
export type { Checkpoint } from "./state/checkpoint.js";

// Errors and results
export {
  ParseError,
  RejectedRequestError,
  PreconditionError,
  TimeoutError,
  isStageError,
  toErrorRecord,
} from "./errors.js";
export type { StageError } from "./errors.js";
export { ok, err } from "./result.js";
export type { Result } from "./result.js";

// Configuration
export { loadConfig } from "./config.js";
export type { AppConfig, LlmConfig, SearchConfig, WorkflowConfig, LlmProvider } from "./config.js";

// Adapters
export { TieredLlmAdapter, createLlmClient } from "./adapters/llm-adapter.js";
export type { LlmAdapter } from "./adapters/llm-adapter.js";
export { TavilySearchClient, TAVILY_SEARCH_URL } from "./adapters/search-client.js";
export type { SearchClient, TavilySearchClientOptions } from "./adapters/search-client.js";

// Engine
export { Orchestrator } from "./engine/orchestrator.js";
export type { OrchestratorConfig } from "./engine/orchestrator.js";
export { PipelineEventEmitter } from "./engine/events.js";
export type { PipelineEvent, EventListener } from "./engine/events.js";
export { resolveTier, STAGE_CATEGORIES } from "./engine/model-tier.js";
export type { TierFlags, TaskCategory } from "./engine/model-tier.js";
export { DEFAULT_BACKOFF, delayForAttempt, retryDelay, shouldRetry } from "./engine/retry.js";
export type { BackoffConfig, RetryPolicy } from "./engine/retry.js";

// Stages
export { ClarifyStage } from "./stages/clarify.js";
export { DescribeStage } from "./stages/describe.js";
export { SearchStage } from "./stages/search.js";
export { BenchmarkStage } from "./stages/benchmark.js";
export { ReportStage, buildReport } from "./stages/report.js";
export { parseModelJson } from "./stages/parse.js";
export type {
  StageHandler,
  StageHandlers,
  StageContext,
  StageDeps,
  StageResult,
  StageSuccess,
} from "./stages/stage.js";

// Output
export { toJson, toMarkdown, toHtml, writeResult, formatForPath } from "./output/formatters.js";
export type { OutputFormat } from "./output/formatters.js";
export { createConsoleReporter, formatEvent, formatSummary } from "./logging.js";

// Runner
export { DiscoveryRunner, createStageHandlers } from "./runner.js";
export type { RunnerConfig } from "./runner.js";
