/**
 * Report: compile the accumulated state into the final document.
 *
 * Pure aggregation, no backend calls. The same state always yields the same
 * report; sections whose upstream data is missing are null.
 */

import type {
  ClarifiedRequest,
  Partner,
  PriceBenchmark,
  ProcurementRequest,
  Report,
  ServiceDescription,
  Vendor,
} from "../state/types.js";
import type { WorkflowState } from "../state/workflow-state.js";
import { ok } from "../result.js";
import type { StageHandler, StageResult } from "./stage.js";

/** The slice of state the report reads. */
export interface ReportInput {
  request: ProcurementRequest;
  clarifiedRequest?: ClarifiedRequest | undefined;
  serviceDescription?: ServiceDescription | undefined;
  vendors?: readonly Vendor[] | undefined;
  partners?: readonly Partner[] | undefined;
  priceBenchmark?: PriceBenchmark | undefined;
  warnings?: readonly string[];
}

const SHORTLIST = 3;

export function formatMoney(amount: number, currency: string): string {
  return `${currency} ${amount.toLocaleString("en-US", { maximumFractionDigits: 2 })}`;
}

export function formatPriceRange(benchmark: PriceBenchmark): string {
  const range = `${formatMoney(benchmark.low, benchmark.currency)} to ${formatMoney(benchmark.high, benchmark.currency)}`;
  return benchmark.pricingModel ? `${range} (${benchmark.pricingModel})` : range;
}

function names(records: readonly { name: string }[]): string {
  return records.map((r) => r.name).join(", ");
}

function executiveSummary(input: ReportInput): string {
  const request = input.clarifiedRequest ?? input.request;
  const parts = [`Procurement discovery for ${request.serviceName} in ${request.country}.`];
  if (input.serviceDescription) parts.push(input.serviceDescription.overview);

  const vendors = input.vendors ?? [];
  const partners = input.partners ?? [];
  if (input.vendors) {
    parts.push(
      `${vendors.length} vendor${vendors.length === 1 ? "" : "s"} and ` +
        `${partners.length} regional partner${partners.length === 1 ? "" : "s"} identified.`,
    );
  }
  const top = vendors[0];
  if (top) parts.push(`Top-ranked vendor: ${top.name} (score ${top.score}).`);
  if (input.priceBenchmark) {
    parts.push(`Typical pricing ranges from ${formatPriceRange(input.priceBenchmark)}.`);
  }
  return parts.join(" ");
}

function implementationRoadmap(input: ReportInput): string[] | null {
  if (!input.serviceDescription && !input.vendors) return null;
  const steps = ["Confirm requirements, scope and success criteria with stakeholders"];
  const compliance = input.clarifiedRequest?.complianceRequirements ?? [];
  if (compliance.length > 0) {
    steps.push(`Validate compliance obligations: ${compliance.join(", ")}`);
  }
  const shortlist = (input.vendors ?? []).slice(0, SHORTLIST);
  if (shortlist.length > 0) {
    steps.push(`Issue a request for proposal to shortlisted vendors: ${names(shortlist)}`);
  }
  const partners = (input.partners ?? []).slice(0, SHORTLIST);
  if (partners.length > 0) {
    steps.push(`Assess regional delivery partners: ${names(partners)}`);
  }
  for (const consideration of input.serviceDescription?.implementationConsiderations.slice(0, SHORTLIST) ?? []) {
    steps.push(`Plan for: ${consideration}`);
  }
  steps.push("Run a pilot with the preferred supplier before full rollout");
  return steps;
}

function riskAssessment(input: ReportInput): string[] | null {
  if (!input.serviceDescription && !input.vendors) return null;
  const risks: string[] = [];
  for (const vendor of (input.vendors ?? []).slice(0, SHORTLIST)) {
    for (const weakness of vendor.weaknesses) risks.push(`${vendor.name}: ${weakness}`);
  }
  if (input.vendors && input.vendors.length < SHORTLIST) {
    risks.push("Limited vendor competition; negotiating leverage may be low");
  }
  if (input.partners && input.partners.length === 0) {
    risks.push(`No regional delivery partners found in ${input.request.country}`);
  }
  for (const standard of input.serviceDescription?.complianceStandards ?? []) {
    risks.push(`Compliance exposure: confirm ${standard} coverage`);
  }
  for (const warning of input.warnings ?? []) risks.push(warning);
  return risks;
}

function nextSteps(input: ReportInput): string[] | null {
  const steps: string[] = [];
  const shortlist = (input.vendors ?? []).slice(0, SHORTLIST);
  if (shortlist.length > 0) {
    steps.push(`Request detailed quotes from ${names(shortlist)}`);
  }
  if (input.priceBenchmark) {
    steps.push(
      `Use ${formatPriceRange(input.priceBenchmark)} as the reference range in negotiations`,
    );
    steps.push(...input.priceBenchmark.recommendations);
  }
  steps.push(...(input.clarifiedRequest?.recommendations ?? []));
  const unique = [...new Set(steps)];
  return unique.length > 0 ? unique : null;
}

export function buildReport(input: ReportInput): Report {
  return {
    executiveSummary: executiveSummary(input),
    serviceAnalysis: input.serviceDescription ?? null,
    vendorRankings: input.vendors ? [...input.vendors] : null,
    partnerRecommendations: input.partners ? [...input.partners] : null,
    priceBenchmark: input.priceBenchmark ?? null,
    implementationRoadmap: implementationRoadmap(input),
    riskAssessment: riskAssessment(input),
    nextSteps: nextSteps(input),
  };
}

export class ReportStage implements StageHandler<"report"> {
  readonly name = "report";

  execute(state: WorkflowState): Promise<StageResult<"report">> {
    const report = buildReport({
      request: state.request,
      clarifiedRequest: state.clarifiedRequest,
      serviceDescription: state.serviceDescription,
      vendors: state.vendors,
      partners: state.partners,
      priceBenchmark: state.priceBenchmark,
      warnings: state.warnings,
    });
    return Promise.resolve(ok({ output: { report: structuredClone(report) } }));
  }
}
