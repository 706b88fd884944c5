import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  AuthenticationError,
  RateLimitError,
  ServerError,
  type TransportError,
} from "@procurement-scout/llm-client";
import { Orchestrator, type OrchestratorConfig } from "../../src/engine/orchestrator.js";
import type { PipelineEvent } from "../../src/engine/events.js";
import { ParseError } from "../../src/errors.js";
import { err, ok } from "../../src/result.js";
import { loadCheckpoint } from "../../src/state/checkpoint.js";
import { WorkflowState } from "../../src/state/workflow-state.js";
import type { StageName, StageOutputs } from "../../src/state/types.js";
import type { StageContext, StageHandler, StageHandlers, StageResult } from "../../src/stages/stage.js";

const REQUEST = { serviceName: "Cloud Storage", country: "United States" };

const OUTPUTS: StageOutputs = {
  clarify: {
    clarifiedRequest: {
      ...REQUEST,
      specificRequirements: [],
      technicalRequirements: [],
      complianceRequirements: [],
      recommendations: [],
    },
  },
  describe: {
    serviceDescription: {
      overview: "Object storage",
      detailedDescription: "",
      keyFeatures: [],
      technicalSpecifications: [],
      useCases: [],
      benefits: [],
      implementationConsiderations: [],
      complianceStandards: [],
      integrationRequirements: [],
      costFactors: [],
    },
  },
  search: {
    vendors: [{ name: "Contoso", score: 90, strengths: [], weaknesses: [], fitNotes: "" }],
    partners: [],
    searchMetadata: { queries: ["q"], sources: [] },
  },
  benchmark: {
    priceBenchmark: {
      low: 1,
      high: 2,
      currency: "USD",
      pricingModel: "per month",
      costFactors: [],
      recommendations: [],
    },
  },
  report: {
    report: {
      executiveSummary: "Done.",
      serviceAnalysis: null,
      vendorRankings: null,
      partnerRecommendations: null,
      priceBenchmark: null,
      implementationRoadmap: null,
      riskAssessment: null,
      nextSteps: null,
    },
  },
};

type Execute<S extends StageName> = (state: WorkflowState, ctx: StageContext) => Promise<StageResult<S>>;

/** Handler that counts its calls and answers through `execute`. */
class ScriptedHandler<S extends StageName> implements StageHandler<S> {
  calls = 0;
  readonly contexts: StageContext[] = [];

  constructor(
    readonly name: S,
    private readonly script: Execute<S> = () => Promise.resolve(ok({ output: OUTPUTS[name] })),
  ) {}

  execute(state: WorkflowState, ctx: StageContext): Promise<StageResult<S>> {
    this.calls++;
    this.contexts.push(ctx);
    return this.script(state, ctx);
  }
}

/** Fails with each error in turn, then succeeds. */
function failing<S extends StageName>(name: S, ...errors: Error[]): ScriptedHandler<S> {
  let next = 0;
  return new ScriptedHandler<S>(name, () => {
    const error = errors[next++];
    if (error instanceof ServerError || error instanceof RateLimitError || error instanceof ParseError) {
      return Promise.resolve(err(error));
    }
    if (error) return Promise.reject(error);
    return Promise.resolve(ok({ output: OUTPUTS[name] }));
  });
}

function alwaysFailing<S extends StageName>(name: S, error: TransportError | ParseError): ScriptedHandler<S> {
  return new ScriptedHandler<S>(name, () => Promise.resolve(err(error)));
}

function handlers(overrides: Partial<StageHandlers> = {}): StageHandlers {
  return {
    clarify: new ScriptedHandler("clarify"),
    describe: new ScriptedHandler("describe"),
    search: new ScriptedHandler("search"),
    benchmark: new ScriptedHandler("benchmark"),
    report: new ScriptedHandler("report"),
    ...overrides,
  };
}

function orchestrator(config: Partial<OrchestratorConfig> = {}) {
  const events: PipelineEvent[] = [];
  const instance = new Orchestrator({
    handlers: handlers(),
    tiers: { useReasoningForAnalysis: true, useReasoningForSearch: true },
    enableSleep: false,
    onEvent: (e) => events.push(e),
    ...config,
  });
  return { instance, events };
}

describe("Orchestrator", () => {
  it("runs every stage in order to completion", async () => {
    const { instance, events } = orchestrator();
    const state = await instance.run(REQUEST);

    expect(state.status).toBe("completed");
    expect(state.completedStages).toEqual(["clarify", "describe", "search", "benchmark", "report"]);
    expect(state.report?.executiveSummary).toBe("Done.");
    expect(state.retryCounts).toEqual({ clarify: 1, describe: 1, search: 1, benchmark: 1, report: 1 });
    expect(state.stageHistory.map((e) => `${e.stage}:${e.status}`)).toEqual([
      "clarify:success",
      "describe:success",
      "search:success",
      "benchmark:success",
      "report:success",
    ]);
    expect(events[0]?.type).toBe("RunStarted");
    expect(events.at(-1)?.type).toBe("RunCompleted");
    expect(events.filter((e) => e.type === "StageCompleted")).toHaveLength(5);
  });

  it("picks each stage's model tier from the flags", async () => {
    const search = new ScriptedHandler("search");
    const { instance, events } = orchestrator({
      handlers: handlers({ search }),
      tiers: { useReasoningForAnalysis: true, useReasoningForSearch: false },
    });
    const state = await instance.run(REQUEST);

    const tiers = events.flatMap((e) => (e.type === "StageStarted" ? [`${e.stage}:${e.tier}`] : []));
    expect(tiers).toEqual([
      "clarify:standard",
      "describe:reasoning",
      "search:standard",
      "benchmark:reasoning",
      "report:reasoning",
    ]);
    expect(search.contexts[0]?.tier).toBe("standard");
    expect(state.stageHistory[1]?.tier).toBe("reasoning");
  });

  it("retries retryable failures and then succeeds", async () => {
    const search = failing("search", new ServerError("upstream down"), new ServerError("upstream down"));
    const { instance, events } = orchestrator({ handlers: handlers({ search }) });
    const state = await instance.run(REQUEST);

    expect(state.status).toBe("completed");
    expect(search.calls).toBe(3);
    expect(state.retryCounts.search).toBe(3);
    expect(
      state.stageHistory.filter((e) => e.stage === "search").map((e) => [e.attempt, e.status]),
    ).toEqual([
      [1, "failed"],
      [2, "failed"],
      [3, "success"],
    ]);
    expect(
      events.flatMap((e) => (e.type === "StageRetrying" ? [e.attempt] : [])),
    ).toEqual([2, 3]);
  });

  it("fails the run once the attempt budget is spent", async () => {
    const search = alwaysFailing("search", new ServerError("upstream down"));
    const benchmark = new ScriptedHandler("benchmark");
    const { instance, events } = orchestrator({ handlers: handlers({ search, benchmark }) });
    const state = await instance.run(REQUEST);

    expect(state.status).toBe("failed");
    expect(search.calls).toBe(3);
    expect(benchmark.calls).toBe(0);
    expect(state.retryCounts.search).toBe(3);
    expect(state.completedStages).toEqual(["clarify", "describe"]);
    expect(state.lastError).toEqual({
      kind: "transport",
      name: "ServerError",
      message: "upstream down",
      stage: "search",
      retryable: true,
    });
    const failed = events.filter((e) => e.type === "StageFailed");
    expect(failed.map((e) => e.type === "StageFailed" && e.willRetry)).toEqual([true, true, false]);
    expect(events.at(-1)).toMatchObject({ type: "RunFailed", stage: "search", error: "upstream down" });
  });

  it("honours a custom attempt budget", async () => {
    const search = alwaysFailing("search", new ServerError("upstream down"));
    const { instance } = orchestrator({
      handlers: handlers({ search }),
      retry: {
        maxRetries: 1,
        backoff: { initialDelayMs: 1, backoffFactor: 2, maxDelayMs: 10, jitter: false },
      },
    });
    await instance.run(REQUEST);
    expect(search.calls).toBe(1);
  });

  it("fails after one attempt on a non-retryable transport error", async () => {
    const search = alwaysFailing("search", new AuthenticationError("Incorrect API key", { provider: "tavily" }));
    const { instance, events } = orchestrator({ handlers: handlers({ search }) });
    const state = await instance.run(REQUEST);

    expect(search.calls).toBe(1);
    expect(state.status).toBe("failed");
    expect(state.retryCounts.search).toBe(1);
    expect(state.lastError).toEqual({
      kind: "transport",
      name: "AuthenticationError",
      message: "Incorrect API key",
      stage: "search",
      retryable: false,
    });
    expect(events.some((e) => e.type === "StageRetrying")).toBe(false);
  });

  it("does not retry a parse error", async () => {
    const describeStage = alwaysFailing("describe", new ParseError("Could not parse service description"));
    const { instance } = orchestrator({ handlers: handlers({ describe: describeStage }) });
    const state = await instance.run(REQUEST);

    expect(describeStage.calls).toBe(1);
    expect(state.status).toBe("failed");
    expect(state.lastError?.kind).toBe("parse");
    expect(state.retryCounts.describe).toBe(1);
  });

  it("treats an unexpected throw as a fatal internal error", async () => {
    const describeStage = failing("describe", new TypeError("boom"));
    const { instance } = orchestrator({ handlers: handlers({ describe: describeStage }) });
    const state = await instance.run(REQUEST);

    expect(describeStage.calls).toBe(1);
    expect(state.lastError).toEqual({
      kind: "internal",
      name: "TypeError",
      message: "boom",
      stage: "describe",
      retryable: false,
    });
  });

  it("uses Retry-After when it is longer than the backoff", async () => {
    const search = failing("search", new RateLimitError("slow down", { retryAfter: 2 }));
    const { instance, events } = orchestrator({
      handlers: handlers({ search }),
      retry: {
        maxRetries: 3,
        backoff: { initialDelayMs: 100, backoffFactor: 2, maxDelayMs: 30_000, jitter: false },
      },
    });
    await instance.run(REQUEST);
    expect(events.find((e) => e.type === "StageRetrying")).toMatchObject({ attempt: 2, delay: 2000 });
  });

  it("records a short-circuited stage", async () => {
    const clarify = new ScriptedHandler("clarify", () =>
      Promise.resolve(ok({ output: OUTPUTS.clarify, shortCircuit: "request already complete" })),
    );
    const { instance, events } = orchestrator({ handlers: handlers({ clarify }) });
    const state = await instance.run(REQUEST);

    expect(state.stageHistory[0]?.note).toBe("request already complete");
    expect(events.find((e) => e.type === "StageShortCircuited")).toMatchObject({
      stage: "clarify",
      reason: "request already complete",
    });
  });

  it("passes the abort signal to handlers", async () => {
    const clarify = new ScriptedHandler("clarify");
    await orchestrator({ handlers: handlers({ clarify }) }).instance.run(REQUEST);
    expect(clarify.contexts[0]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("fails the run when the time budget runs out mid-stage", async () => {
    const search = new ScriptedHandler("search", () => new Promise<StageResult<"search">>(() => {}));
    const { instance } = orchestrator({ handlers: handlers({ search }), timeoutMs: 50 });
    const state = await instance.run(REQUEST);

    expect(state.status).toBe("failed");
    expect(search.calls).toBe(1);
    expect(state.lastError).toEqual({
      kind: "timeout",
      name: "TimeoutError",
      message: "Run exceeded its 50ms budget",
      stage: "search",
      retryable: false,
    });
    expect(search.contexts[0]?.signal?.aborted).toBe(true);
  });

  it("fails the run when the time budget runs out during backoff", async () => {
    const search = alwaysFailing("search", new ServerError("upstream down"));
    const { instance } = orchestrator({
      handlers: handlers({ search }),
      enableSleep: true,
      timeoutMs: 30,
      retry: {
        maxRetries: 3,
        backoff: { initialDelayMs: 10_000, backoffFactor: 2, maxDelayMs: 30_000, jitter: false },
      },
    });
    const state = await instance.run(REQUEST);

    expect(search.calls).toBe(1);
    expect(state.lastError?.kind).toBe("timeout");
    expect(state.retryCounts.search).toBe(1);
  });

  it("rejects an attempt budget below one", () => {
    expect(
      () =>
        new Orchestrator({
          handlers: handlers(),
          tiers: { useReasoningForAnalysis: false, useReasoningForSearch: false },
          retry: {
            maxRetries: 0,
            backoff: { initialDelayMs: 1, backoffFactor: 2, maxDelayMs: 10, jitter: false },
          },
        }),
    ).toThrow(RangeError);
  });

  it("keeps concurrent runs independent", async () => {
    const { instance } = orchestrator();
    const [a, b] = await Promise.all([
      instance.run(REQUEST),
      instance.run({ serviceName: "Payroll", country: "Germany" }),
    ]);
    expect(a.runId).not.toBe(b.runId);
    expect(a.status).toBe("completed");
    expect(b.status).toBe("completed");
    expect(b.request.serviceName).toBe("Payroll");
  });

  describe("resume", () => {
    it("continues a failed run from its first unfinished stage", async () => {
      const first = orchestrator({
        handlers: handlers({ search: alwaysFailing("search", new ParseError("Could not parse vendor list")) }),
      });
      const failed = await first.instance.run(REQUEST);
      expect(failed.status).toBe("failed");

      const clarify = new ScriptedHandler("clarify");
      const second = orchestrator({ handlers: handlers({ clarify }) });
      const state = await second.instance.resume(failed);

      expect(state.status).toBe("completed");
      expect(state.lastError).toBeUndefined();
      expect(clarify.calls).toBe(0);
      expect(state.retryCounts.search).toBe(1);
      expect(state.stageHistory.map((e) => `${e.stage}:${e.status}`)).toEqual([
        "clarify:success",
        "describe:success",
        "search:failed",
        "search:success",
        "benchmark:success",
        "report:success",
      ]);
      expect(second.events[0]).toMatchObject({ type: "RunStarted", resumed: true });
    });

    it("returns a completed state untouched", async () => {
      const { instance, events } = orchestrator();
      const done = await instance.run(REQUEST);
      events.length = 0;
      await expect(instance.resume(done)).resolves.toBe(done);
      expect(events).toEqual([]);
    });
  });

  describe("checkpoints", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "orchestrator-test-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("saves after every stage attempt", async () => {
      const checkpointPath = path.join(tmpDir, "run.json");
      const { instance, events } = orchestrator({ checkpointPath });
      const state = await instance.run(REQUEST);

      expect(events.filter((e) => e.type === "CheckpointSaved")).toHaveLength(5);
      const checkpoint = loadCheckpoint(checkpointPath);
      expect(checkpoint.currentStage).toBe("report");
      expect(checkpoint.snapshot.runId).toBe(state.runId);
      expect(checkpoint.snapshot.completedStages).toHaveLength(5);
    });

    it("resumes a failed run from disk", async () => {
      const checkpointPath = path.join(tmpDir, "run.json");
      const first = orchestrator({
        checkpointPath,
        handlers: handlers({ benchmark: alwaysFailing("benchmark", new ParseError("bad")) }),
      });
      const failed = await first.instance.run(REQUEST);

      const saved = loadCheckpoint(checkpointPath);
      expect(saved.currentStage).toBe("benchmark");
      expect(saved.snapshot.status).toBe("failed");

      const search = new ScriptedHandler("search");
      const second = orchestrator({ handlers: handlers({ search }) });
      const state = await second.instance.resume(WorkflowState.fromSnapshot(saved.snapshot));

      expect(state.runId).toBe(failed.runId);
      expect(state.status).toBe("completed");
      expect(search.calls).toBe(0);
    });
  });
});
