import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  createCheckpoint,
  saveCheckpoint,
  loadCheckpoint,
} from "../../src/state/checkpoint.js";
import { WorkflowState } from "../../src/state/workflow-state.js";

function sampleState(): WorkflowState {
  const state = new WorkflowState(
    { serviceName: "Cloud Storage", country: "United States", details: "500 users" },
    "run-42",
  );
  state.start();
  state.recordAttempt("clarify", "success", { tier: "standard" });
  state.commit("clarify", {
    clarifiedRequest: {
      serviceName: "Cloud Storage",
      country: "United States",
      countryCode: "US",
      specificRequirements: ["Encryption at rest"],
      technicalRequirements: [],
      complianceRequirements: [],
      confidence: 0.9,
      recommendations: [],
    },
  });
  state.recordAttempt("describe", "failed", {
    tier: "reasoning",
    error: {
      kind: "transport",
      name: "RateLimitError",
      message: "slow down",
      stage: "describe",
      retryable: true,
    },
  });
  return state;
}

describe("Checkpoint", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "checkpoint-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("creates a checkpoint with an independent snapshot", () => {
    const snapshot = sampleState().snapshot();
    const cp = createCheckpoint("describe", snapshot);

    snapshot.warnings.push("mutated");

    expect(cp.currentStage).toBe("describe");
    expect(cp.snapshot.warnings).toEqual([]);
    expect(cp.timestamp).toBeTruthy();
  });

  it("writes snake_case top-level fields", () => {
    const filePath = path.join(tmpDir, "checkpoint.json");
    saveCheckpoint(createCheckpoint("describe", sampleState().snapshot()), filePath);

    const raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    expect(raw.version).toBe(1);
    expect(raw.current_stage).toBe("describe");
    expect(raw.state.runId).toBe("run-42");
  });

  it("creates missing parent directories", () => {
    const filePath = path.join(tmpDir, "nested", "deeper", "checkpoint.json");
    saveCheckpoint(createCheckpoint("clarify", sampleState().snapshot()), filePath);
    expect(fs.existsSync(filePath)).toBe(true);
  });

  it("round-trips through save and load", () => {
    const filePath = path.join(tmpDir, "checkpoint.json");
    const state = sampleState();
    const original = createCheckpoint("describe", state.snapshot());
    saveCheckpoint(original, filePath);

    const loaded = loadCheckpoint(filePath);
    expect(loaded.timestamp).toBe(original.timestamp);
    expect(loaded.currentStage).toBe("describe");
    expect(loaded.snapshot).toEqual(state.snapshot());

    const restored = WorkflowState.fromSnapshot(loaded.snapshot);
    expect(restored.nextStage()).toBe("describe");
    expect(restored.retryCounts).toEqual({ clarify: 1, describe: 1 });
  });

  it("rejects a file that is not JSON", () => {
    const filePath = path.join(tmpDir, "broken.json");
    fs.writeFileSync(filePath, "{not json");
    expect(() => loadCheckpoint(filePath)).toThrow(`Invalid checkpoint file: ${filePath}`);
  });

  it("rejects a file without the envelope fields", () => {
    const filePath = path.join(tmpDir, "partial.json");
    fs.writeFileSync(filePath, JSON.stringify({ version: 1, state: {} }));
    expect(() => loadCheckpoint(filePath)).toThrow(
      `Checkpoint file is missing required fields: ${filePath}`,
    );
  });

  it("rejects a malformed state", () => {
    const filePath = path.join(tmpDir, "bad-state.json");
    const snapshot = sampleState().snapshot();
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        version: 1,
        timestamp: "2024-01-01T00:00:00.000Z",
        current_stage: "describe",
        state: { ...snapshot, completedStages: ["unknown-stage"] },
      }),
    );
    expect(() => loadCheckpoint(filePath)).toThrow(/^Checkpoint state is malformed \(completedStages\.0: /);
  });

  it("throws when the file does not exist", () => {
    expect(() => loadCheckpoint(path.join(tmpDir, "missing.json"))).toThrow();
  });
});
