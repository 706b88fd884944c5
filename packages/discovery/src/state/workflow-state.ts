/**
 * WorkflowState: the single record threaded through a discovery run.
 *
 * Stage handlers only read it. The orchestrator is the only writer, through
 * `commit` (stage outputs) and `recordAttempt` (history and retry
 * bookkeeping), so the audit trail always matches what actually ran.
 */

import { randomUUID } from "node:crypto";
import { PreconditionError } from "../errors.js";
import {
  AttemptStatus,
  RunStatus,
  STAGE_NAMES,
  type ClarifiedRequest,
  type ErrorRecord,
  type ModelTier,
  type Partner,
  type PriceBenchmark,
  type ProcurementRequest,
  type Report,
  type SearchMetadata,
  type ServiceDescription,
  type StageHistoryEntry,
  type StageName,
  type StageOutputs,
  type Vendor,
} from "./types.js";

/** Plain-data form of a WorkflowState, as written to checkpoints. */
export interface WorkflowSnapshot {
  runId: string;
  status: RunStatus;
  request: ProcurementRequest;
  clarifiedRequest?: ClarifiedRequest;
  serviceDescription?: ServiceDescription;
  vendors?: Vendor[];
  partners?: Partner[];
  searchMetadata?: SearchMetadata;
  priceBenchmark?: PriceBenchmark;
  report?: Report;
  completedStages: StageName[];
  stageHistory: StageHistoryEntry[];
  retryCounts: Partial<Record<StageName, number>>;
  warnings: string[];
  lastError?: ErrorRecord;
}

export interface AttemptDetails {
  tier?: ModelTier;
  error?: ErrorRecord;
  note?: string;
}

type Appliers = { [S in StageName]: (output: StageOutputs[S]) => void };

export class WorkflowState {
  readonly runId: string;
  readonly request: Readonly<ProcurementRequest>;

  private _status: RunStatus = RunStatus.PENDING;
  private _clarifiedRequest: ClarifiedRequest | undefined;
  private _serviceDescription: ServiceDescription | undefined;
  private _vendors: Vendor[] | undefined;
  private _partners: Partner[] | undefined;
  private _searchMetadata: SearchMetadata | undefined;
  private _priceBenchmark: PriceBenchmark | undefined;
  private _report: Report | undefined;
  private _lastError: ErrorRecord | undefined;
  private completed: StageName[] = [];
  private history: StageHistoryEntry[] = [];
  private retries: Partial<Record<StageName, number>> = {};
  private _warnings: string[] = [];

  private readonly appliers: Appliers = {
    clarify: (output) => {
      this._clarifiedRequest = output.clarifiedRequest;
      for (const warning of output.warnings ?? []) this.addWarning(warning);
    },
    describe: (output) => {
      this._serviceDescription = output.serviceDescription;
    },
    search: (output) => {
      this._vendors = output.vendors;
      this._partners = output.partners;
      this._searchMetadata = output.searchMetadata;
    },
    benchmark: (output) => {
      this._priceBenchmark = output.priceBenchmark;
    },
    report: (output) => {
      this._report = output.report;
    },
  };

  constructor(request: ProcurementRequest, runId: string = randomUUID()) {
    this.runId = runId;
    this.request = Object.freeze({ ...request });
  }

  // ---------- Read access ----------

  get status(): RunStatus {
    return this._status;
  }
  get clarifiedRequest(): ClarifiedRequest | undefined {
    return this._clarifiedRequest;
  }
  get serviceDescription(): ServiceDescription | undefined {
    return this._serviceDescription;
  }
  get vendors(): readonly Vendor[] | undefined {
    return this._vendors;
  }
  get partners(): readonly Partner[] | undefined {
    return this._partners;
  }
  get searchMetadata(): SearchMetadata | undefined {
    return this._searchMetadata;
  }
  get priceBenchmark(): PriceBenchmark | undefined {
    return this._priceBenchmark;
  }
  get report(): Report | undefined {
    return this._report;
  }
  get lastError(): ErrorRecord | undefined {
    return this._lastError;
  }
  get stageHistory(): readonly StageHistoryEntry[] {
    return this.history;
  }
  get retryCounts(): Readonly<Partial<Record<StageName, number>>> {
    return this.retries;
  }
  get warnings(): readonly string[] {
    return this._warnings;
  }
  get completedStages(): readonly StageName[] {
    return this.completed;
  }

  isCompleted(stage: StageName): boolean {
    return this.completed.includes(stage);
  }

  /** First stage that has not completed, or undefined when all have. */
  nextStage(): StageName | undefined {
    return STAGE_NAMES.find((stage) => !this.isCompleted(stage));
  }

  isTerminal(): boolean {
    return this._status === RunStatus.COMPLETED || this._status === RunStatus.FAILED;
  }

  // ---------- Bookkeeping ----------

  /**
   * Append one attempt to the history and bump the stage's attempt counter.
   * Every attempt, first try included, counts.
   */
  recordAttempt(
    stage: StageName,
    status: AttemptStatus,
    details: AttemptDetails = {},
  ): StageHistoryEntry {
    const attempt = (this.retries[stage] ?? 0) + 1;
    this.retries[stage] = attempt;
    const entry: StageHistoryEntry = {
      stage,
      status,
      timestamp: new Date().toISOString(),
      attempt,
      ...(details.tier ? { tier: details.tier } : {}),
      ...(details.note ? { note: details.note } : {}),
      ...(details.error ? { error: details.error } : {}),
    };
    this.history.push(entry);
    return entry;
  }

  /** Whether another attempt keeps `retryCounts[stage]` within `maxRetries`. */
  canRetry(stage: StageName, maxRetries: number): boolean {
    return (this.retries[stage] ?? 0) < maxRetries;
  }

  addWarning(message: string): void {
    this._warnings.push(message);
  }

  // ---------- Transitions ----------

  /**
   * Apply a stage's output.
   *
   * @throws {PreconditionError} when the predecessor has not completed or the
   *   stage was already committed.
   */
  commit<S extends StageName>(stage: S, output: StageOutputs[S]): void {
    if (this.isCompleted(stage)) {
      throw new PreconditionError(`Stage "${stage}" already completed`, stage);
    }
    const expected = this.nextStage();
    if (expected !== stage) {
      throw new PreconditionError(
        `Stage "${stage}" cannot run before "${expected ?? "none"}" completes`,
        stage,
      );
    }
    const apply: (output: StageOutputs[S]) => void = this.appliers[stage];
    apply(structuredClone(output));
    this.completed.push(stage);
  }

  /**
   * Mark the run as running. Restarting a failed run clears the old verdict
   * and gives unfinished stages a fresh retry budget; history is kept.
   */
  start(): void {
    if (this._status === RunStatus.FAILED) {
      this._lastError = undefined;
      for (const stage of STAGE_NAMES) {
        if (!this.isCompleted(stage)) delete this.retries[stage];
      }
    }
    this._status = RunStatus.RUNNING;
  }

  complete(): void {
    this._status = RunStatus.COMPLETED;
  }

  fail(error: ErrorRecord): void {
    this._lastError = error;
    this._status = RunStatus.FAILED;
  }

  // ---------- Serialization ----------

  snapshot(): WorkflowSnapshot {
    return structuredClone({
      runId: this.runId,
      status: this._status,
      request: { ...this.request },
      ...(this._clarifiedRequest ? { clarifiedRequest: this._clarifiedRequest } : {}),
      ...(this._serviceDescription ? { serviceDescription: this._serviceDescription } : {}),
      ...(this._vendors ? { vendors: this._vendors } : {}),
      ...(this._partners ? { partners: this._partners } : {}),
      ...(this._searchMetadata ? { searchMetadata: this._searchMetadata } : {}),
      ...(this._priceBenchmark ? { priceBenchmark: this._priceBenchmark } : {}),
      ...(this._report ? { report: this._report } : {}),
      completedStages: this.completed,
      stageHistory: this.history,
      retryCounts: this.retries,
      warnings: this._warnings,
      ...(this._lastError ? { lastError: this._lastError } : {}),
    });
  }

  static fromSnapshot(snapshot: WorkflowSnapshot): WorkflowState {
    const data = structuredClone(snapshot);
    const state = new WorkflowState(data.request, data.runId);
    state._status = data.status;
    state._clarifiedRequest = data.clarifiedRequest;
    state._serviceDescription = data.serviceDescription;
    state._vendors = data.vendors;
    state._partners = data.partners;
    state._searchMetadata = data.searchMetadata;
    state._priceBenchmark = data.priceBenchmark;
    state._report = data.report;
    state.completed = data.completedStages;
    state.history = data.stageHistory;
    state.retries = data.retryCounts;
    state._warnings = data.warnings;
    state._lastError = data.lastError;
    return state;
  }
}
