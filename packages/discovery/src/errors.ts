/**
 * Stage-level error taxonomy.
 *
 * Transport failures come from `@procurement-scout/llm-client` and carry
 * their own `retryable` flag. Everything defined here is fatal to a run.
 */

import { TransportError } from "@procurement-scout/llm-client";
import type { ErrorKind, ErrorRecord, StageName } from "./state/types.js";

/** The model's response did not match the expected structure. */
export class ParseError extends Error {
  readonly retryable = false;
  /** Offending raw text, truncated. */
  readonly raw: string | undefined;

  constructor(message: string, options: { raw?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ParseError";
    this.raw = options.raw?.slice(0, 2000);
  }
}

/** The model judged the input not to be an actionable procurement request. */
export class RejectedRequestError extends ParseError {
  constructor(
    message: string,
    readonly confidence: number,
  ) {
    super(message);
    this.name = "RejectedRequestError";
  }
}

/** A stage ran without the upstream output it depends on. */
export class PreconditionError extends Error {
  readonly retryable = false;

  constructor(
    message: string,
    readonly stage: StageName,
  ) {
    super(message);
    this.name = "PreconditionError";
  }
}

/** The run-level wall-clock budget ran out. */
export class TimeoutError extends Error {
  readonly retryable = false;

  constructor(readonly timeoutMs: number) {
    super(`Run exceeded its ${timeoutMs}ms budget`);
    this.name = "TimeoutError";
  }
}

export type StageError =
  | TransportError
  | ParseError
  | PreconditionError
  | TimeoutError;

export function isStageError(error: unknown): error is StageError {
  return (
    error instanceof TransportError ||
    error instanceof ParseError ||
    error instanceof PreconditionError ||
    error instanceof TimeoutError
  );
}

export function errorKind(error: StageError): ErrorKind {
  if (error instanceof TransportError) return "transport";
  if (error instanceof ParseError) return "parse";
  if (error instanceof PreconditionError) return "precondition";
  return "timeout";
}

/** Flatten an error into the JSON-safe shape kept in state history. */
export function toErrorRecord(error: unknown, stage: StageName): ErrorRecord {
  if (isStageError(error)) {
    return {
      kind: errorKind(error),
      name: error.name,
      message: error.message,
      stage,
      retryable: error.retryable,
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    kind: "internal",
    name: error instanceof Error ? error.name : "Error",
    message,
    stage,
    retryable: false,
  };
}
