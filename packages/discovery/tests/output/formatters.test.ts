import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  escapeHtml,
  formatForPath,
  toHtml,
  toJson,
  toMarkdown,
  toSnakeKeys,
  writeResult,
} from "../../src/output/formatters.js";
import type { WorkflowSnapshot } from "../../src/state/workflow-state.js";
import type { Report } from "../../src/state/types.js";

const REPORT: Report = {
  executiveSummary: "Procurement discovery for Cloud Storage in United States.",
  serviceAnalysis: null,
  vendorRankings: [
    { name: "Contoso | Cloud", score: 91, strengths: ["Scale", "SLAs"], weaknesses: [], fitNotes: "" },
  ],
  partnerRecommendations: [],
  priceBenchmark: null,
  implementationRoadmap: ["Confirm scope", "Run a pilot"],
  riskAssessment: [],
  nextSteps: ["Request quotes"],
};

function completedSnapshot(overrides: Partial<WorkflowSnapshot> = {}): WorkflowSnapshot {
  return {
    runId: "run-7",
    status: "completed",
    request: { serviceName: "Cloud Storage", country: "United States" },
    report: REPORT,
    searchMetadata: { queries: ["top cloud storage vendors"], sources: ["https://a.example"] },
    completedStages: ["clarify", "describe", "search", "benchmark", "report"],
    stageHistory: [
      { stage: "clarify", status: "success", timestamp: "2026-01-01T00:00:00.000Z", attempt: 1 },
    ],
    retryCounts: { clarify: 1 },
    warnings: [],
    ...overrides,
  };
}

function failedSnapshot(): WorkflowSnapshot {
  const error = {
    kind: "transport" as const,
    name: "ServerError",
    message: "upstream | down",
    stage: "search" as const,
    retryable: true,
  };
  return {
    runId: "run-8",
    status: "failed",
    request: { serviceName: "Cloud Storage", country: "United States" },
    completedStages: ["clarify", "describe"],
    stageHistory: [
      { stage: "search", status: "failed", timestamp: "2026-01-01T00:00:00.000Z", attempt: 1, error },
    ],
    retryCounts: { search: 1 },
    warnings: ["Clarification confidence is low (0.5); results may be imprecise"],
    lastError: error,
  };
}

describe("toSnakeKeys", () => {
  it("renames nested keys and leaves values alone", () => {
    expect(toSnakeKeys({ runId: "x", stageHistory: [{ retryAfter: 1, note: "keepThis" }] })).toEqual({
      run_id: "x",
      stage_history: [{ retry_after: 1, note: "keepThis" }],
    });
  });
});

describe("toJson", () => {
  it("writes snake_case keys and nulls for missing sections", () => {
    const doc = JSON.parse(toJson(completedSnapshot()));
    expect(Object.keys(doc)).toEqual([
      "run_id",
      "status",
      "request",
      "clarified_request",
      "report",
      "search_metadata",
      "warnings",
      "error",
      "stage_history",
    ]);
    expect(doc.clarified_request).toBeNull();
    expect(doc.error).toBeNull();
    expect(doc.request).toEqual({ service_name: "Cloud Storage", country: "United States" });
    expect(doc.report.executive_summary).toBe(REPORT.executiveSummary);
    expect(doc.report.price_benchmark).toBeNull();
    expect(doc.report.vendor_rankings[0].fit_notes).toBe("");
  });

  it("includes the error record of a failed run", () => {
    const doc = JSON.parse(toJson(failedSnapshot()));
    expect(doc.status).toBe("failed");
    expect(doc.error).toEqual({
      kind: "transport",
      name: "ServerError",
      message: "upstream | down",
      stage: "search",
      retryable: true,
    });
    expect(doc.report).toBeNull();
  });

  it("indents with two spaces", () => {
    expect(toJson(completedSnapshot()).split("\n")[1]).toBe('  "run_id": "run-7",');
  });
});

describe("toMarkdown", () => {
  it("renders the report sections", () => {
    const lines = toMarkdown(completedSnapshot()).split("\n");
    expect(lines[0]).toBe("# Procurement Report: Cloud Storage (United States)");
    expect(lines).toContain("**Status:** completed");
    expect(lines).toContain("## Executive Summary");
    expect(lines).toContain("| 1 | Contoso \\| Cloud | 91 | Scale; SLAs |");
    expect(lines).toContain("## Regional Partners");
    expect(lines).toContain("2. Run a pilot");
    expect(lines).toContain("1. Request quotes");
  });

  it("omits empty and null sections", () => {
    const lines = toMarkdown(completedSnapshot()).split("\n");
    expect(lines).not.toContain("## Price Benchmark");
    expect(lines).not.toContain("## Service Analysis");
    expect(lines).not.toContain("## Risk Assessment");
    expect(lines).not.toContain("## Warnings");
    expect(lines).not.toContain("## Error");
  });

  it("renders the benchmark when present", () => {
    const report: Report = {
      ...REPORT,
      priceBenchmark: {
        low: 1500,
        high: 4000,
        currency: "USD",
        pricingModel: "per month",
        costFactors: ["Egress"],
        marketAverage: 2500,
        recommendations: [],
      },
    };
    const lines = toMarkdown(completedSnapshot({ report })).split("\n");
    expect(lines).toContain("## Price Benchmark");
    expect(lines).toContain("**Range:** USD 1,500 to USD 4,000 (per month)");
    expect(lines).toContain("**Market average:** USD 2,500");
    expect(lines).toContain("- Egress");
  });

  it("explains a failure with the stage history", () => {
    const lines = toMarkdown(failedSnapshot()).split("\n");
    expect(lines).toContain("## Warnings");
    expect(lines).toContain("- **Stage:** search");
    expect(lines).toContain("- **Kind:** transport (ServerError)");
    expect(lines).toContain("| search | 1 | failed | upstream \\| down |");
  });
});

describe("toHtml", () => {
  it("escapes all text", () => {
    const html = toHtml(
      completedSnapshot({ request: { serviceName: "R&D <Labs>", country: "United States" } }),
    );
    expect(html).toContain("<h1>Procurement Report: R&amp;D &lt;Labs&gt; (United States)</h1>");
    expect(html).toContain("<title>Procurement Report: R&amp;D &lt;Labs&gt; (United States)</title>");
    expect(html).not.toContain("<Labs>");
  });

  it("renders tables and ordered lists", () => {
    const html = toHtml(completedSnapshot());
    expect(html.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(html).toContain("<td>Contoso | Cloud</td><td>91</td><td>Scale; SLAs</td>");
    expect(html).toContain("<ol><li>Confirm scope</li><li>Run a pilot</li></ol>");
    expect(html).not.toContain("Price Benchmark");
  });

  it("shows the error of a failed run", () => {
    expect(toHtml(failedSnapshot())).toContain("<p><strong>search</strong>: upstream | down</p>");
  });
});

describe("escapeHtml", () => {
  it("escapes the five special characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
  });
});

describe("formatForPath", () => {
  it("picks the format from the extension", () => {
    expect(formatForPath("out/report.md")).toBe("markdown");
    expect(formatForPath("report.MARKDOWN")).toBe("markdown");
    expect(formatForPath("report.html")).toBe("html");
    expect(formatForPath("report.htm")).toBe("html");
    expect(formatForPath("report.json")).toBe("json");
    expect(formatForPath("report.txt")).toBe("json");
    expect(formatForPath("report")).toBe("json");
  });
});

describe("writeResult", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "formatters-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("creates parent directories and writes the chosen format", () => {
    const file = path.join(tmpDir, "nested", "dir", "report.md");
    const snapshot = completedSnapshot();
    expect(writeResult(file, snapshot)).toBe("markdown");
    expect(fs.readFileSync(file, "utf-8")).toBe(toMarkdown(snapshot));
  });

  it("writes JSON for unknown extensions", () => {
    const file = path.join(tmpDir, "report.out");
    expect(writeResult(file, completedSnapshot())).toBe("json");
    expect(JSON.parse(fs.readFileSync(file, "utf-8")).run_id).toBe("run-7");
  });
});
