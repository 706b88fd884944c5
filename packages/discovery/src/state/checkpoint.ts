/**
 * Checkpoint: a WorkflowState written to disk after each stage attempt so a
 * failed or interrupted run can be inspected and resumed.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import type { WorkflowSnapshot } from "./workflow-state.js";
import { STAGE_NAMES, type StageName } from "./types.js";

export interface Checkpoint {
  /** ISO timestamp when this checkpoint was created */
  timestamp: string;
  /** Stage whose attempt triggered the checkpoint */
  currentStage: StageName;
  snapshot: WorkflowSnapshot;
}

/** Serializable JSON shape (matches what's written to disk) */
interface CheckpointJSON {
  version: 1;
  timestamp: string;
  current_stage: StageName;
  state: WorkflowSnapshot;
}

// ---------- Validation ----------

const stageName = z.enum(STAGE_NAMES);
const strings = z.array(z.string());

const requestSchema = z.object({
  serviceName: z.string(),
  country: z.string(),
  details: z.string().optional(),
});

const errorRecordSchema = z.object({
  kind: z.enum(["transport", "parse", "precondition", "timeout", "internal"]),
  name: z.string(),
  message: z.string(),
  stage: stageName,
  retryable: z.boolean(),
});

const vendorSchema = z.object({
  name: z.string(),
  score: z.number(),
  strengths: strings,
  weaknesses: strings,
  fitNotes: z.string(),
  website: z.string().optional(),
  headquarters: z.string().optional(),
  marketPosition: z.string().optional(),
});

const partnerSchema = z.object({
  name: z.string(),
  score: z.number(),
  vendorRelationship: z.string(),
  location: z.string(),
  specializations: strings,
  fitNotes: z.string(),
  website: z.string().optional(),
});

const descriptionSchema = z.object({
  overview: z.string(),
  detailedDescription: z.string(),
  keyFeatures: strings,
  technicalSpecifications: strings,
  useCases: strings,
  benefits: strings,
  implementationConsiderations: strings,
  complianceStandards: strings,
  integrationRequirements: strings,
  costFactors: strings,
});

const benchmarkSchema = z.object({
  low: z.number(),
  high: z.number(),
  currency: z.string(),
  pricingModel: z.string(),
  costFactors: strings,
  marketAverage: z.number().optional(),
  recommendations: strings,
});

const snapshotSchema: z.ZodType<WorkflowSnapshot> = z.object({
  runId: z.string(),
  status: z.enum(["pending", "running", "completed", "failed"]),
  request: requestSchema,
  clarifiedRequest: requestSchema
    .extend({
      serviceCategory: z.string().optional(),
      countryCode: z.string().optional(),
      region: z.string().optional(),
      businessContext: z.string().optional(),
      specificRequirements: strings,
      technicalRequirements: strings,
      complianceRequirements: strings,
      urgencyLevel: z.string().optional(),
      budgetRange: z.string().optional(),
      confidence: z.number().optional(),
      recommendations: strings,
    })
    .optional(),
  serviceDescription: descriptionSchema.optional(),
  vendors: z.array(vendorSchema).optional(),
  partners: z.array(partnerSchema).optional(),
  searchMetadata: z.object({ queries: strings, sources: strings }).optional(),
  priceBenchmark: benchmarkSchema.optional(),
  report: z
    .object({
      executiveSummary: z.string(),
      serviceAnalysis: descriptionSchema.nullable(),
      vendorRankings: z.array(vendorSchema).nullable(),
      partnerRecommendations: z.array(partnerSchema).nullable(),
      priceBenchmark: benchmarkSchema.nullable(),
      implementationRoadmap: strings.nullable(),
      riskAssessment: strings.nullable(),
      nextSteps: strings.nullable(),
    })
    .optional(),
  completedStages: z.array(stageName),
  stageHistory: z.array(
    z.object({
      stage: stageName,
      status: z.enum(["success", "failed"]),
      timestamp: z.string(),
      attempt: z.number().int().positive(),
      tier: z.enum(["standard", "reasoning"]).optional(),
      note: z.string().optional(),
      error: errorRecordSchema.optional(),
    }),
  ),
  retryCounts: z.record(z.number().int().nonnegative()),
  warnings: strings,
  lastError: errorRecordSchema.optional(),
});

const checkpointFileSchema = z.object({
  version: z.literal(1),
  timestamp: z.string(),
  current_stage: stageName,
  state: z.unknown(),
});

// ---------- API ----------

/**
 * Create a new checkpoint from current state.
 */
export function createCheckpoint(
  currentStage: StageName,
  snapshot: WorkflowSnapshot,
): Checkpoint {
  return {
    timestamp: new Date().toISOString(),
    currentStage,
    snapshot: structuredClone(snapshot),
  };
}

/**
 * Save checkpoint to a JSON file.
 */
export function saveCheckpoint(checkpoint: Checkpoint, filePath: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const json: CheckpointJSON = {
    version: 1,
    timestamp: checkpoint.timestamp,
    current_stage: checkpoint.currentStage,
    state: checkpoint.snapshot,
  };

  fs.writeFileSync(filePath, JSON.stringify(json, null, 2), "utf-8");
}

/**
 * Load checkpoint from a JSON file.
 *
 * @throws {Error} when the file is not valid JSON or not a checkpoint.
 */
export function loadCheckpoint(filePath: string): Checkpoint {
  const raw = fs.readFileSync(filePath, "utf-8");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (cause) {
    throw new Error(`Invalid checkpoint file: ${filePath}`, { cause });
  }

  const file = checkpointFileSchema.safeParse(json);
  if (!file.success) {
    throw new Error(`Checkpoint file is missing required fields: ${filePath}`);
  }

  const snapshot = snapshotSchema.safeParse(file.data.state);
  if (!snapshot.success) {
    const issue = snapshot.error.issues[0];
    const where = issue ? ` (${issue.path.join(".")}: ${issue.message})` : "";
    throw new Error(`Checkpoint state is malformed${where}: ${filePath}`);
  }

  return {
    timestamp: file.data.timestamp,
    currentStage: file.data.current_stage,
    snapshot: snapshot.data,
  };
}
