/**
 * Pipeline observability events.
 *
 * The orchestrator emits typed events during a run; the console reporter and
 * tests subscribe to them.
 */

import type { ModelTier, StageName } from "../state/types.js";

// ---------- Event Types ----------

export interface RunStartedEvent {
  type: "RunStarted";
  runId: string;
  serviceName: string;
  country: string;
  resumed: boolean;
  timestamp: string;
}

export interface RunCompletedEvent {
  type: "RunCompleted";
  runId: string;
  duration: number;
  timestamp: string;
}

export interface RunFailedEvent {
  type: "RunFailed";
  runId: string;
  stage: StageName;
  error: string;
  duration: number;
  timestamp: string;
}

export interface StageStartedEvent {
  type: "StageStarted";
  stage: StageName;
  index: number;
  attempt: number;
  tier: ModelTier;
  timestamp: string;
}

export interface StageCompletedEvent {
  type: "StageCompleted";
  stage: StageName;
  index: number;
  duration: number;
  timestamp: string;
}

export interface StageShortCircuitedEvent {
  type: "StageShortCircuited";
  stage: StageName;
  index: number;
  reason: string;
  timestamp: string;
}

export interface StageFailedEvent {
  type: "StageFailed";
  stage: StageName;
  index: number;
  error: string;
  willRetry: boolean;
  timestamp: string;
}

export interface StageRetryingEvent {
  type: "StageRetrying";
  stage: StageName;
  index: number;
  /** Number of the attempt about to start. */
  attempt: number;
  delay: number;
  timestamp: string;
}

export interface CheckpointSavedEvent {
  type: "CheckpointSaved";
  stage: StageName;
  path: string;
  timestamp: string;
}

export type PipelineEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | StageStartedEvent
  | StageCompletedEvent
  | StageShortCircuitedEvent
  | StageFailedEvent
  | StageRetryingEvent
  | CheckpointSavedEvent;

// ---------- Event Emitter ----------

export type EventListener = (event: PipelineEvent) => void;

export class PipelineEventEmitter {
  private readonly listeners: EventListener[] = [];

  /** Register an event listener. */
  on(listener: EventListener): void {
    this.listeners.push(listener);
  }

  emit(event: PipelineEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  emitRunStarted(runId: string, serviceName: string, country: string, resumed: boolean): void {
    this.emit({
      type: "RunStarted",
      runId,
      serviceName,
      country,
      resumed,
      timestamp: new Date().toISOString(),
    });
  }

  emitRunCompleted(runId: string, duration: number): void {
    this.emit({
      type: "RunCompleted",
      runId,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitRunFailed(runId: string, stage: StageName, error: string, duration: number): void {
    this.emit({
      type: "RunFailed",
      runId,
      stage,
      error,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitStageStarted(stage: StageName, index: number, attempt: number, tier: ModelTier): void {
    this.emit({
      type: "StageStarted",
      stage,
      index,
      attempt,
      tier,
      timestamp: new Date().toISOString(),
    });
  }

  emitStageCompleted(stage: StageName, index: number, duration: number): void {
    this.emit({
      type: "StageCompleted",
      stage,
      index,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitStageShortCircuited(stage: StageName, index: number, reason: string): void {
    this.emit({
      type: "StageShortCircuited",
      stage,
      index,
      reason,
      timestamp: new Date().toISOString(),
    });
  }

  emitStageFailed(
    stage: StageName,
    index: number,
    error: string,
    willRetry: boolean,
  ): void {
    this.emit({
      type: "StageFailed",
      stage,
      index,
      error,
      willRetry,
      timestamp: new Date().toISOString(),
    });
  }

  emitStageRetrying(
    stage: StageName,
    index: number,
    attempt: number,
    delay: number,
  ): void {
    this.emit({
      type: "StageRetrying",
      stage,
      index,
      attempt,
      delay,
      timestamp: new Date().toISOString(),
    });
  }

  emitCheckpointSaved(stage: StageName, path: string): void {
    this.emit({
      type: "CheckpointSaved",
      stage,
      path,
      timestamp: new Date().toISOString(),
    });
  }
}
