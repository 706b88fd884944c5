/**
 * Render a finished run as JSON, Markdown or HTML, and write it to disk.
 *
 * All formatters take the plain snapshot so they work on a live state and on
 * a loaded checkpoint alike.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { WorkflowSnapshot } from "../state/workflow-state.js";
import type { PriceBenchmark, Report } from "../state/types.js";
import { formatPriceRange } from "../stages/report.js";

export type OutputFormat = "json" | "markdown" | "html";

// ---------- JSON ----------

function snakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

/** Recursively rename object keys from camelCase to snake_case. */
export function toSnakeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toSnakeKeys);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[snakeCase(key)] = toSnakeKeys(child);
    }
    return out;
  }
  return value;
}

export function toJson(snapshot: WorkflowSnapshot): string {
  const document = {
    runId: snapshot.runId,
    status: snapshot.status,
    request: snapshot.request,
    clarifiedRequest: snapshot.clarifiedRequest ?? null,
    report: snapshot.report ?? null,
    searchMetadata: snapshot.searchMetadata ?? null,
    warnings: snapshot.warnings,
    error: snapshot.lastError ?? null,
    stageHistory: snapshot.stageHistory,
  };
  return JSON.stringify(toSnakeKeys(document), null, 2);
}

// ---------- Markdown ----------

function mdCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function mdList(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`);
}

function mdBenchmark(benchmark: PriceBenchmark): string[] {
  const lines = [`**Range:** ${formatPriceRange(benchmark)}`];
  if (benchmark.marketAverage !== undefined) {
    lines.push(`**Market average:** ${benchmark.currency} ${benchmark.marketAverage.toLocaleString("en-US")}`);
  }
  if (benchmark.costFactors.length > 0) {
    lines.push("", "**Cost factors:**", ...mdList(benchmark.costFactors));
  }
  return lines;
}

function mdReport(report: Report): string[] {
  const out: string[] = ["## Executive Summary", "", report.executiveSummary, ""];

  if (report.serviceAnalysis) {
    const analysis = report.serviceAnalysis;
    out.push("## Service Analysis", "", analysis.overview, "");
    if (analysis.detailedDescription) out.push(analysis.detailedDescription, "");
    if (analysis.keyFeatures.length > 0) {
      out.push("**Key features:**", ...mdList(analysis.keyFeatures), "");
    }
  }

  if (report.vendorRankings) {
    out.push("## Vendor Rankings", "", "| Rank | Vendor | Score | Strengths |", "|---|---|---|---|");
    report.vendorRankings.forEach((vendor, i) => {
      out.push(
        `| ${i + 1} | ${mdCell(vendor.name)} | ${vendor.score} | ${mdCell(vendor.strengths.join("; "))} |`,
      );
    });
    out.push("");
  }

  if (report.partnerRecommendations) {
    out.push("## Regional Partners", "", "| Partner | Score | Location | Vendor relationship |", "|---|---|---|---|");
    for (const partner of report.partnerRecommendations) {
      out.push(
        `| ${mdCell(partner.name)} | ${partner.score} | ${mdCell(partner.location)} | ${mdCell(partner.vendorRelationship)} |`,
      );
    }
    out.push("");
  }

  if (report.priceBenchmark) {
    out.push("## Price Benchmark", "", ...mdBenchmark(report.priceBenchmark), "");
  }
  if (report.implementationRoadmap) {
    out.push(
      "## Implementation Roadmap",
      "",
      ...report.implementationRoadmap.map((step, i) => `${i + 1}. ${step}`),
      "",
    );
  }
  if (report.riskAssessment && report.riskAssessment.length > 0) {
    out.push("## Risk Assessment", "", ...mdList(report.riskAssessment), "");
  }
  if (report.nextSteps) {
    out.push("## Next Steps", "", ...report.nextSteps.map((step, i) => `${i + 1}. ${step}`), "");
  }
  return out;
}

export function toMarkdown(snapshot: WorkflowSnapshot): string {
  const { request } = snapshot;
  const out: string[] = [
    `# Procurement Report: ${request.serviceName} (${request.country})`,
    "",
    `**Run:** ${snapshot.runId}  `,
    `**Status:** ${snapshot.status}`,
    "",
  ];

  if (snapshot.report) out.push(...mdReport(snapshot.report));

  if (snapshot.warnings.length > 0) {
    out.push("## Warnings", "", ...mdList(snapshot.warnings), "");
  }

  if (snapshot.lastError) {
    const error = snapshot.lastError;
    out.push(
      "## Error",
      "",
      `- **Stage:** ${error.stage}`,
      `- **Kind:** ${error.kind} (${error.name})`,
      `- **Message:** ${error.message}`,
      "",
      "## Stage History",
      "",
      "| Stage | Attempt | Status | Error |",
      "|---|---|---|---|",
      ...snapshot.stageHistory.map(
        (entry) =>
          `| ${entry.stage} | ${entry.attempt} | ${entry.status} | ${mdCell(entry.error?.message ?? "")} |`,
      ),
      "",
    );
  }

  return out.join("\n");
}

// ---------- HTML ----------

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

function htmlList(items: readonly string[], ordered = false): string {
  const tag = ordered ? "ol" : "ul";
  return `<${tag}>${items.map((item) => `<li>${escapeHtml(item)}</li>`).join("")}</${tag}>`;
}

function htmlTable(head: readonly string[], rows: readonly (readonly string[])[]): string {
  const th = head.map((h) => `<th>${escapeHtml(h)}</th>`).join("");
  const body = rows
    .map((row) => `<tr>${row.map((cell) => `<td>${escapeHtml(cell)}</td>`).join("")}</tr>`)
    .join("");
  return `<table><thead><tr>${th}</tr></thead><tbody>${body}</tbody></table>`;
}

function section(title: string, body: string): string {
  return `<section><h2>${escapeHtml(title)}</h2>${body}</section>`;
}

function htmlReport(report: Report): string[] {
  const parts = [section("Executive Summary", `<p>${escapeHtml(report.executiveSummary)}</p>`)];
  if (report.serviceAnalysis) {
    const analysis = report.serviceAnalysis;
    parts.push(
      section(
        "Service Analysis",
        `<p>${escapeHtml(analysis.overview)}</p>` +
          (analysis.keyFeatures.length > 0 ? htmlList(analysis.keyFeatures) : ""),
      ),
    );
  }
  if (report.vendorRankings) {
    parts.push(
      section(
        "Vendor Rankings",
        htmlTable(
          ["Rank", "Vendor", "Score", "Strengths"],
          report.vendorRankings.map((v, i) => [String(i + 1), v.name, String(v.score), v.strengths.join("; ")]),
        ),
      ),
    );
  }
  if (report.partnerRecommendations) {
    parts.push(
      section(
        "Regional Partners",
        htmlTable(
          ["Partner", "Score", "Location", "Vendor relationship"],
          report.partnerRecommendations.map((p) => [p.name, String(p.score), p.location, p.vendorRelationship]),
        ),
      ),
    );
  }
  if (report.priceBenchmark) {
    const benchmark = report.priceBenchmark;
    parts.push(
      section(
        "Price Benchmark",
        `<p>${escapeHtml(formatPriceRange(benchmark))}</p>` +
          (benchmark.costFactors.length > 0 ? htmlList(benchmark.costFactors) : ""),
      ),
    );
  }
  if (report.implementationRoadmap) {
    parts.push(section("Implementation Roadmap", htmlList(report.implementationRoadmap, true)));
  }
  if (report.riskAssessment && report.riskAssessment.length > 0) {
    parts.push(section("Risk Assessment", htmlList(report.riskAssessment)));
  }
  if (report.nextSteps) {
    parts.push(section("Next Steps", htmlList(report.nextSteps, true)));
  }
  return parts;
}

export function toHtml(snapshot: WorkflowSnapshot): string {
  const { request } = snapshot;
  const title = `Procurement Report: ${request.serviceName} (${request.country})`;
  const parts: string[] = [
    `<h1>${escapeHtml(title)}</h1>`,
    `<p class="meta">Run ${escapeHtml(snapshot.runId)}: ${escapeHtml(snapshot.status)}</p>`,
  ];
  if (snapshot.report) parts.push(...htmlReport(snapshot.report));
  if (snapshot.warnings.length > 0) parts.push(section("Warnings", htmlList(snapshot.warnings)));
  if (snapshot.lastError) {
    const error = snapshot.lastError;
    parts.push(
      section(
        "Error",
        `<p><strong>${escapeHtml(error.stage)}</strong>: ${escapeHtml(error.message)}</p>` +
          htmlTable(
            ["Stage", "Attempt", "Status", "Error"],
            snapshot.stageHistory.map((e) => [e.stage, String(e.attempt), e.status, e.error?.message ?? ""]),
          ),
      ),
    );
  }

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    "<style>body{font-family:sans-serif;max-width:960px;margin:2rem auto;line-height:1.5}" +
      "table{border-collapse:collapse;width:100%}th,td{border:1px solid #ccc;padding:.4rem;text-align:left}" +
      ".meta{color:#666}</style>",
    "</head>",
    "<body>",
    ...parts,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

// ---------- Files ----------

/** Format implied by a file extension; unknown extensions get JSON. */
export function formatForPath(filePath: string): OutputFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".md" || ext === ".markdown") return "markdown";
  if (ext === ".html" || ext === ".htm") return "html";
  return "json";
}

const RENDERERS: Record<OutputFormat, (snapshot: WorkflowSnapshot) => string> = {
  json: toJson,
  markdown: toMarkdown,
  html: toHtml,
};

/** Write the run to `filePath`, creating parent directories. */
export function writeResult(filePath: string, snapshot: WorkflowSnapshot): OutputFormat {
  const format = formatForPath(filePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, RENDERERS[format](snapshot), "utf-8");
  return format;
}
