/**
 * Orchestrator: drives a WorkflowState through the stages in order.
 *
 * For each stage it resolves the model tier, invokes the handler, commits the
 * output on success and applies the retry policy on failure. Only retryable
 * transport errors are retried; everything else fails the run at once.
 * A run-level timeout aborts the in-flight call and fails the run with a
 * TimeoutError.
 */

import { TimeoutError, toErrorRecord } from "../errors.js";
import { createCheckpoint, saveCheckpoint } from "../state/checkpoint.js";
import {
  AttemptStatus,
  RunStatus,
  STAGE_NAMES,
  type ProcurementRequest,
  type StageName,
} from "../state/types.js";
import { WorkflowState } from "../state/workflow-state.js";
import type {
  StageContext,
  StageHandler,
  StageHandlers,
  StageResult,
} from "../stages/stage.js";
import { PipelineEventEmitter } from "./events.js";
import type { PipelineEvent } from "./events.js";
import { resolveTier, type TierFlags } from "./model-tier.js";
import { DEFAULT_BACKOFF, retryDelay, shouldRetry, sleep } from "./retry.js";
import type { RetryPolicy } from "./retry.js";

// ---------- Types ----------

export interface OrchestratorConfig {
  handlers: StageHandlers;
  tiers: TierFlags;
  /** Default: 3 attempts per stage with DEFAULT_BACKOFF. */
  retry?: RetryPolicy;
  /** Run-level wall-clock budget. Unlimited when not set. */
  timeoutMs?: number;
  /** Write a checkpoint here after every stage attempt. */
  checkpointPath?: string;
  /** Event listener callback. */
  onEvent?: (event: PipelineEvent) => void;
  /** Whether to actually sleep during retries. Default true. */
  enableSleep?: boolean;
  /** Jitter source, for tests. */
  rng?: () => number;
}

// ---------- Orchestrator ----------

export class Orchestrator {
  readonly events: PipelineEventEmitter;
  private config: OrchestratorConfig;
  private retry: RetryPolicy;

  constructor(config: OrchestratorConfig) {
    this.config = config;
    this.retry = config.retry ?? { maxRetries: 3, backoff: DEFAULT_BACKOFF };
    if (this.retry.maxRetries < 1) {
      throw new RangeError(`maxRetries must be at least 1, got ${this.retry.maxRetries}`);
    }
    this.events = new PipelineEventEmitter();
    if (config.onEvent) {
      this.events.on(config.onEvent);
    }
  }

  /** Run a new request to a terminal state. */
  run(request: ProcurementRequest): Promise<WorkflowState> {
    return this.drive(new WorkflowState(request), false);
  }

  /**
   * Continue a checkpointed state from its first uncompleted stage. A failed
   * state gets a fresh retry budget for the stages it has not completed.
   */
  async resume(state: WorkflowState): Promise<WorkflowState> {
    if (state.status === RunStatus.COMPLETED) return state;
    return this.drive(state, true);
  }

  private async drive(state: WorkflowState, resumed: boolean): Promise<WorkflowState> {
    const startTime = Date.now();
    state.start();
    this.events.emitRunStarted(
      state.runId,
      state.request.serviceName,
      state.request.country,
      resumed,
    );

    const controller = new AbortController();
    const { timeoutMs } = this.config;
    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs)
        : undefined;

    try {
      for (let stage = state.nextStage(); stage; stage = state.nextStage()) {
        const succeeded = controller.signal.aborted
          ? this.abandon(state, stage, controller.signal.reason)
          : await this.executeWithRetry(state, stage, controller.signal);
        if (!succeeded) {
          const error = state.lastError;
          this.events.emitRunFailed(
            state.runId,
            stage,
            error?.message ?? "unknown error",
            Date.now() - startTime,
          );
          return state;
        }
      }
      state.complete();
      this.events.emitRunCompleted(state.runId, Date.now() - startTime);
      return state;
    } finally {
      clearTimeout(timer);
    }
  }

  private async executeWithRetry<S extends StageName>(
    state: WorkflowState,
    stage: S,
    signal: AbortSignal,
  ): Promise<boolean> {
    const handler: StageHandler<S> = this.config.handlers[stage];
    const index = STAGE_NAMES.indexOf(stage);
    const tier = resolveTier(stage, this.config.tiers);

    for (;;) {
      const attempt = (state.retryCounts[stage] ?? 0) + 1;
      this.events.emitStageStarted(stage, index, attempt, tier);
      const stageStart = Date.now();

      let failure: unknown;
      try {
        const result = await this.invoke(handler, state, { tier, signal }, signal);
        if (result.ok) {
          state.commit(stage, result.value.output);
          const note = result.value.shortCircuit;
          state.recordAttempt(stage, AttemptStatus.SUCCESS, { tier, ...(note ? { note } : {}) });
          if (note) this.events.emitStageShortCircuited(stage, index, note);
          this.events.emitStageCompleted(stage, index, Date.now() - stageStart);
          this.saveCheckpoint(state, stage);
          return true;
        }
        failure = result.error;
      } catch (error) {
        failure = error;
      }

      // Whatever the in-flight call reported, a timeout is the real cause.
      if (signal.aborted && signal.reason instanceof TimeoutError) {
        failure = signal.reason;
      }
      const record = toErrorRecord(failure, stage);
      state.recordAttempt(stage, AttemptStatus.FAILED, { tier, error: record });
      const willRetry =
        !signal.aborted && shouldRetry(failure) && state.canRetry(stage, this.retry.maxRetries);
      this.events.emitStageFailed(stage, index, record.message, willRetry);

      if (!willRetry) {
        state.fail(record);
        this.saveCheckpoint(state, stage);
        return false;
      }
      this.saveCheckpoint(state, stage);

      const delay = retryDelay(failure, attempt, this.retry.backoff, this.config.rng);
      this.events.emitStageRetrying(stage, index, attempt + 1, delay);
      if (this.config.enableSleep !== false) {
        try {
          await sleep(delay, signal);
        } catch (error) {
          return this.abandon(state, stage, error);
        }
      }
    }
  }

  /** Fail the run at `stage` without recording an attempt. */
  private abandon(state: WorkflowState, stage: StageName, reason: unknown): false {
    state.fail(toErrorRecord(reason, stage));
    this.saveCheckpoint(state, stage);
    return false;
  }

  /**
   * Invoke a handler, settling early with the abort reason if `signal` fires
   * before the handler does.
   */
  private invoke<S extends StageName>(
    handler: StageHandler<S>,
    state: WorkflowState,
    ctx: StageContext,
    signal: AbortSignal,
  ): Promise<StageResult<S>> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => reject(signal.reason);
      signal.addEventListener("abort", onAbort, { once: true });
      handler.execute(state, ctx).then(
        (result) => {
          signal.removeEventListener("abort", onAbort);
          resolve(result);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  private saveCheckpoint(state: WorkflowState, stage: StageName): void {
    const filePath = this.config.checkpointPath;
    if (!filePath) return;
    saveCheckpoint(createCheckpoint(stage, state.snapshot()), filePath);
    this.events.emitCheckpointSaved(stage, filePath);
  }
}
