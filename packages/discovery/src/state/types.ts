/**
 * Domain records threaded through the discovery pipeline.
 */

// ---------- Stages ----------

/** Fixed stage order. Index in this array is the stage's position. */
export const STAGE_NAMES = [
  "clarify",
  "describe",
  "search",
  "benchmark",
  "report",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export const RunStatus = {
  PENDING: "pending",
  RUNNING: "running",
  COMPLETED: "completed",
  FAILED: "failed",
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export const AttemptStatus = {
  SUCCESS: "success",
  FAILED: "failed",
} as const;

export type AttemptStatus = (typeof AttemptStatus)[keyof typeof AttemptStatus];

export const ModelTier = {
  STANDARD: "standard",
  REASONING: "reasoning",
} as const;

export type ModelTier = (typeof ModelTier)[keyof typeof ModelTier];

// ---------- Request ----------

export interface ProcurementRequest {
  serviceName: string;
  country: string;
  details?: string;
}

export interface ClarifiedRequest extends ProcurementRequest {
  serviceCategory?: string;
  countryCode?: string;
  region?: string;
  businessContext?: string;
  specificRequirements: string[];
  technicalRequirements: string[];
  complianceRequirements: string[];
  urgencyLevel?: string;
  budgetRange?: string;
  /** 0-1. Absent when clarification was short-circuited. */
  confidence?: number;
  recommendations: string[];
}

// ---------- Stage outputs ----------

export interface ServiceDescription {
  overview: string;
  detailedDescription: string;
  keyFeatures: string[];
  technicalSpecifications: string[];
  useCases: string[];
  benefits: string[];
  implementationConsiderations: string[];
  complianceStandards: string[];
  integrationRequirements: string[];
  costFactors: string[];
}

export interface Vendor {
  name: string;
  /** 0-100, higher is a better fit. */
  score: number;
  strengths: string[];
  weaknesses: string[];
  fitNotes: string;
  website?: string;
  headquarters?: string;
  marketPosition?: string;
}

export interface Partner {
  name: string;
  score: number;
  vendorRelationship: string;
  location: string;
  specializations: string[];
  fitNotes: string;
  website?: string;
}

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchMetadata {
  queries: string[];
  sources: string[];
}

export interface PriceBenchmark {
  low: number;
  high: number;
  currency: string;
  pricingModel: string;
  costFactors: string[];
  marketAverage?: number;
  recommendations: string[];
}

export interface Report {
  executiveSummary: string;
  serviceAnalysis: ServiceDescription | null;
  vendorRankings: Vendor[] | null;
  partnerRecommendations: Partner[] | null;
  priceBenchmark: PriceBenchmark | null;
  implementationRoadmap: string[] | null;
  riskAssessment: string[] | null;
  nextSteps: string[] | null;
}

/** What each stage contributes to the state when it succeeds. */
export interface StageOutputs {
  clarify: { clarifiedRequest: ClarifiedRequest; warnings?: string[] };
  describe: { serviceDescription: ServiceDescription };
  search: { vendors: Vendor[]; partners: Partner[]; searchMetadata: SearchMetadata };
  benchmark: { priceBenchmark: PriceBenchmark };
  report: { report: Report };
}

export type StageOutput = StageOutputs[StageName];

// ---------- Bookkeeping ----------

/** `internal` covers anything thrown that is not a stage error (a bug). */
export type ErrorKind = "transport" | "parse" | "precondition" | "timeout" | "internal";

export interface ErrorRecord {
  kind: ErrorKind;
  name: string;
  message: string;
  stage: StageName;
  retryable: boolean;
}

export interface StageHistoryEntry {
  stage: StageName;
  status: AttemptStatus;
  timestamp: string;
  /** 1-indexed attempt number within the stage. */
  attempt: number;
  tier?: ModelTier;
  note?: string;
  error?: ErrorRecord;
}
