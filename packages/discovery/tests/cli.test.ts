import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { runCli, type CliIO, type Runner } from "../src/cli/program.js";
import type { RunnerConfig } from "../src/runner.js";
import type { ProcurementRequest } from "../src/state/types.js";
import { WorkflowState } from "../src/state/workflow-state.js";
import { TEST_ENV } from "./helpers/fakes.js";

function plain(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}

function finishedState(request: ProcurementRequest, completed: boolean): WorkflowState {
  const state = new WorkflowState(request, "run-cli");
  state.start();
  if (completed) {
    state.complete();
  } else {
    state.fail({
      kind: "parse",
      name: "ParseError",
      message: "Could not parse vendor list",
      stage: "search",
      retryable: false,
    });
  }
  return state;
}

class FakeIO implements CliIO {
  env: Record<string, string | undefined> = { ...TEST_ENV };
  stdout = "";
  stderr = "";
  runnerOptions: RunnerConfig[] = [];
  requests: ProcurementRequest[] = [];
  resumed: string[] = [];
  completes = true;
  failWith: Error | undefined;

  out = (text: string): void => {
    this.stdout += text;
  };

  err = (text: string): void => {
    this.stderr += text;
  };

  createRunner = (_config: unknown, options: RunnerConfig): Runner => {
    this.runnerOptions.push(options);
    return {
      run: async (request) => {
        if (this.failWith) throw this.failWith;
        this.requests.push(request);
        return finishedState(request, this.completes);
      },
      resume: async (checkpointPath) => {
        this.resumed.push(checkpointPath);
        return finishedState({ serviceName: "Cloud Storage", country: "United States" }, this.completes);
      },
    };
  };
}

describe("runCli", () => {
  let io: FakeIO;

  beforeEach(() => {
    io = new FakeIO();
  });

  it("runs a request and prints the summary", async () => {
    const code = await runCli(["run", "Cloud Storage", "United States"], io);

    expect(code).toBe(0);
    expect(io.requests).toEqual([{ serviceName: "Cloud Storage", country: "United States" }]);
    const lines = plain(io.stdout).split("\n");
    expect(lines).toContain("PROCUREMENT DISCOVERY SUMMARY");
    expect(lines).toContain("Service: Cloud Storage");
    expect(lines).toContain("Status: completed");
  });

  it("passes details through", async () => {
    await runCli(["run", "Payroll", "Germany", "-d", "300 employees"], io);
    expect(io.requests).toEqual([{ serviceName: "Payroll", country: "Germany", details: "300 employees" }]);
  });

  it("exits 1 when the run fails", async () => {
    io.completes = false;
    const code = await runCli(["run", "Cloud Storage", "United States"], io);
    expect(code).toBe(1);
    expect(plain(io.stdout).split("\n")).toContain("Error in search: Could not parse vendor list");
  });

  it("reports progress to stderr unless quiet", async () => {
    await runCli(["run", "Cloud Storage", "United States"], io);
    expect(io.runnerOptions[0]?.onEvent).toBeTypeOf("function");

    const quiet = new FakeIO();
    await runCli(["run", "Cloud Storage", "United States", "--quiet"], quiet);
    expect(quiet.runnerOptions[0]?.onEvent).toBeUndefined();
  });

  it("forwards the checkpoint path", async () => {
    await runCli(["run", "Cloud Storage", "United States", "--checkpoint", "runs/cp.json"], io);
    expect(io.runnerOptions[0]?.checkpointPath).toBe("runs/cp.json");
  });

  it("prints configuration problems and exits 1", async () => {
    io.env = {};
    const code = await runCli(["run", "Cloud Storage", "United States"], io);
    expect(code).toBe(1);
    expect(plain(io.stderr).split("\n")[0]).toBe("Error: Invalid configuration:");
    expect(io.runnerOptions).toEqual([]);
  });

  it("prints an unexpected runner error and exits 1", async () => {
    io.failWith = new Error("disk full");
    const code = await runCli(["run", "Cloud Storage", "United States"], io);
    expect(code).toBe(1);
    expect(plain(io.stderr)).toBe("Error: disk full\n");
  });

  it("returns commander's exit code for usage errors", async () => {
    const code = await runCli(["run", "Cloud Storage"], io);
    expect(code).toBe(1);
    expect(io.stderr).toBe("error: missing required argument 'country'\n");
    expect(io.requests).toEqual([]);
  });

  it("prints the version", async () => {
    const code = await runCli(["--version"], io);
    expect(code).toBe(0);
    expect(io.stdout).toBe("0.1.0\n");
  });

  it("resumes from a checkpoint file", async () => {
    const code = await runCli(["resume", "runs/cp.json", "-q"], io);
    expect(code).toBe(0);
    expect(io.resumed).toEqual(["runs/cp.json"]);
    expect(io.runnerOptions[0]).toEqual({ checkpointPath: "runs/cp.json" });
  });

  describe("with --output", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-test-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("writes the report and says where", async () => {
      const file = path.join(tmpDir, "report.md");
      const code = await runCli(["run", "Cloud Storage", "United States", "-o", file], io);

      expect(code).toBe(0);
      expect(io.stdout).toBe("");
      expect(io.stderr).toBe(`Report written to ${file} (markdown)\n`);
      expect(fs.readFileSync(file, "utf-8").split("\n")[0]).toBe(
        "# Procurement Report: Cloud Storage (United States)",
      );
    });

    it("stays silent when quiet", async () => {
      const file = path.join(tmpDir, "report.json");
      await runCli(["run", "Cloud Storage", "United States", "-o", file, "-q"], io);
      expect(io.stderr).toBe("");
      expect(JSON.parse(fs.readFileSync(file, "utf-8")).run_id).toBe("run-cli");
    });
  });
});
