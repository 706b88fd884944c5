/**
 * Stage handler contract.
 *
 * Handlers read the WorkflowState and return their output; they never write
 * to the state. The orchestrator commits the output on success and decides
 * what to do with an error.
 */

import type { AppConfig } from "../config.js";
import type { LlmAdapter } from "../adapters/llm-adapter.js";
import type { SearchClient } from "../adapters/search-client.js";
import { isStageError, type StageError } from "../errors.js";
import { err, ok, type Result } from "../result.js";
import type { WorkflowState } from "../state/workflow-state.js";
import type { ModelTier, StageName, StageOutputs } from "../state/types.js";

export interface StageContext {
  tier: ModelTier;
  /** Aborts in-flight adapter calls when the run times out. */
  signal?: AbortSignal;
}

export interface StageSuccess<S extends StageName> {
  output: StageOutputs[S];
  /** Set when the stage finished without calling its backend. */
  shortCircuit?: string;
}

export type StageResult<S extends StageName> = Result<StageSuccess<S>, StageError>;

export interface StageHandler<S extends StageName> {
  readonly name: S;
  execute(state: WorkflowState, ctx: StageContext): Promise<StageResult<S>>;
}

/** One handler per stage, keyed by stage name. */
export type StageHandlers = { [S in StageName]: StageHandler<S> };

/** Collaborators shared by the stage handlers. */
export interface StageDeps {
  llm: LlmAdapter;
  search: SearchClient;
  config: Readonly<AppConfig>;
}

/**
 * Run a stage body, turning stage errors into an `err` result. Anything else
 * thrown is a bug and propagates.
 */
export async function guard<S extends StageName>(
  body: () => Promise<StageSuccess<S>>,
): Promise<StageResult<S>> {
  try {
    return ok(await body());
  } catch (error) {
    if (isStageError(error)) return err(error);
    throw error;
  }
}

/** Unwrap a parse result inside a `guard` body. */
export function unwrap<T>(result: Result<T, StageError>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
