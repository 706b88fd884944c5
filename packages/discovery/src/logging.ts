/**
 * Console output: a pipeline event reporter and the end-of-run summary.
 */

import pc from "picocolors";
import type { EventListener, PipelineEvent } from "./engine/events.js";
import type { WorkflowSnapshot } from "./state/workflow-state.js";
import { formatPriceRange } from "./stages/report.js";

export interface ReporterOptions {
  /** Also report retries and checkpoints. */
  verbose?: boolean;
  /** Line sink. Default: console.error, keeping stdout for results. */
  write?: (line: string) => void;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/** Text for an event, or undefined when the event is not shown. */
export function formatEvent(event: PipelineEvent, verbose = false): string | undefined {
  switch (event.type) {
    case "RunStarted":
      return pc.bold(
        `${event.resumed ? "Resuming" : "Starting"} discovery for "${event.serviceName}" in ${event.country}`,
      );
    case "StageStarted":
      return `${pc.cyan("▸")} ${event.stage} ${pc.dim(`(attempt ${event.attempt}, ${event.tier} model)`)}`;
    case "StageCompleted":
      return `${pc.green("✓")} ${event.stage} ${pc.dim(seconds(event.duration))}`;
    case "StageShortCircuited":
      return `${pc.green("✓")} ${event.stage} skipped: ${event.reason}`;
    case "StageFailed":
      return `${pc.red("✗")} ${event.stage}: ${event.error}${event.willRetry ? pc.dim(" (will retry)") : ""}`;
    case "StageRetrying":
      return verbose
        ? pc.yellow(`  retrying ${event.stage} in ${seconds(event.delay)} (attempt ${event.attempt})`)
        : undefined;
    case "CheckpointSaved":
      return verbose ? pc.dim(`  checkpoint saved to ${event.path}`) : undefined;
    case "RunCompleted":
      return pc.green(pc.bold(`Discovery completed in ${seconds(event.duration)}`));
    case "RunFailed":
      return pc.red(pc.bold(`Discovery failed at ${event.stage}: ${event.error}`));
  }
}

export function createConsoleReporter(options: ReporterOptions = {}): EventListener {
  const write = options.write ?? ((line: string) => console.error(line));
  return (event) => {
    const line = formatEvent(event, options.verbose);
    if (line !== undefined) write(line);
  };
}

/** Short human summary of a finished run. */
export function formatSummary(snapshot: WorkflowSnapshot): string {
  const divider = pc.dim("─".repeat(60));
  const lines = [divider, pc.bold("PROCUREMENT DISCOVERY SUMMARY"), divider];
  lines.push(`Service: ${snapshot.request.serviceName}`);
  lines.push(`Country: ${snapshot.request.country}`);
  lines.push(`Run: ${snapshot.runId}`);
  lines.push(
    `Status: ${snapshot.status === "completed" ? pc.green(snapshot.status) : pc.red(snapshot.status)}`,
  );

  const report = snapshot.report;
  if (report) {
    lines.push("", pc.bold("Executive summary"), report.executiveSummary);
    const vendors = report.vendorRankings ?? [];
    if (vendors.length > 0) {
      lines.push("", pc.bold(`Vendors found: ${vendors.length}`));
      vendors.slice(0, 3).forEach((vendor, i) => {
        lines.push(`  ${i + 1}. ${vendor.name} (score ${vendor.score}/100)`);
      });
    }
    const partners = report.partnerRecommendations ?? [];
    if (partners.length > 0) lines.push(pc.bold(`Partners found: ${partners.length}`));
    if (report.priceBenchmark) {
      lines.push(`Price range: ${formatPriceRange(report.priceBenchmark)}`);
    }
  }

  if (snapshot.lastError) {
    lines.push("", pc.red(`Error in ${snapshot.lastError.stage}: ${snapshot.lastError.message}`));
  }
  if (snapshot.warnings.length > 0) {
    lines.push("", pc.yellow("Warnings:"), ...snapshot.warnings.map((w) => `  • ${w}`));
  }
  lines.push(divider);
  return lines.join("\n");
}
