/**
 * Clarify: normalize and enrich the raw request.
 *
 * A request that already names a known service category, a country and a
 * scale or business context is passed through without calling the model.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { PreconditionError, RejectedRequestError } from "../errors.js";
import type { ClarifiedRequest, ProcurementRequest } from "../state/types.js";
import type { WorkflowState } from "../state/workflow-state.js";
import { parseModelJson } from "./parse.js";
import { clarificationPrompt } from "./prompts.js";
import { clarificationSchema } from "./schemas.js";
import {
  guard,
  unwrap,
  type StageContext,
  type StageDeps,
  type StageHandler,
  type StageResult,
} from "./stage.js";

/** Below this the request is rejected outright. */
export const REJECT_CONFIDENCE = 0.3;
/** Below this the run continues with a warning. */
export const WARN_CONFIDENCE = 0.7;

// ---------- Category lookup ----------

const categoryFileSchema = z.object({
  categories: z.array(z.object({ name: z.string(), keywords: z.array(z.string()) })),
});

export interface ServiceCategory {
  name: string;
  keywords: string[];
}

let cachedCategories: ServiceCategory[] | undefined;

function loadCategories(): ServiceCategory[] {
  if (!cachedCategories) {
    const file = new URL("../../data/service-categories.json", import.meta.url);
    cachedCategories = categoryFileSchema.parse(
      JSON.parse(fs.readFileSync(file, "utf-8")),
    ).categories;
  }
  return cachedCategories;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Name of the first category with a keyword in `serviceName`. */
export function matchCategory(
  serviceName: string,
  categories: readonly ServiceCategory[] = loadCategories(),
): string | undefined {
  const name = serviceName.toLowerCase();
  for (const category of categories) {
    for (const keyword of category.keywords) {
      const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword)}([^a-z0-9]|$)`);
      if (pattern.test(name)) return category.name;
    }
  }
  return undefined;
}

const SCALE_PATTERN =
  /\b\d[\d,.]*\s*[km]?\s*(employees|staff|users|seats|people|sites|locations|offices|branches|devices|endpoints|licenses|tb|gb|pb)\b/i;
const CONTEXT_PATTERN =
  /\b(enterprise|small business|smb|sme|mid-size|midsize|mid-market|startup|nationwide|multinational|global)\b/i;

export function hasScaleOrContext(details: string | undefined): boolean {
  if (!details) return false;
  return SCALE_PATTERN.test(details) || CONTEXT_PATTERN.test(details);
}

/**
 * The request as a ClarifiedRequest when it needs no clarification, else
 * undefined.
 */
export function passThrough(request: ProcurementRequest): ClarifiedRequest | undefined {
  if (request.country.trim() === "" || !hasScaleOrContext(request.details)) return undefined;
  const serviceCategory = matchCategory(request.serviceName);
  if (!serviceCategory) return undefined;
  return {
    ...request,
    serviceCategory,
    specificRequirements: [],
    technicalRequirements: [],
    complianceRequirements: [],
    recommendations: [],
  };
}

// ---------- Handler ----------

export class ClarifyStage implements StageHandler<"clarify"> {
  readonly name = "clarify";

  constructor(private readonly deps: StageDeps) {}

  execute(state: WorkflowState, ctx: StageContext): Promise<StageResult<"clarify">> {
    return guard(async () => {
      const request = state.request;
      if (request.serviceName.trim() === "") {
        throw new PreconditionError("Request has no service name", "clarify");
      }

      const direct = passThrough(request);
      if (direct) {
        return {
          output: { clarifiedRequest: direct },
          shortCircuit: `request already complete (${direct.serviceCategory ?? "known category"})`,
        };
      }

      const raw = await this.deps.llm.complete(
        ctx.tier,
        clarificationPrompt(request),
        undefined,
        ctx.signal,
      );
      const answer = unwrap(parseModelJson(raw, clarificationSchema, "clarification"));

      const confidence = answer.confidence_score;
      if (!answer.is_valid_request || confidence < REJECT_CONFIDENCE) {
        throw new RejectedRequestError(
          `Request rejected as not an actionable procurement request (confidence ${confidence})`,
          confidence,
        );
      }

      const warnings: string[] = [];
      if (confidence < WARN_CONFIDENCE) {
        warnings.push(
          `Clarification confidence is low (${confidence}); results may be imprecise`,
        );
      }

      const clarifiedRequest: ClarifiedRequest = {
        serviceName: answer.clarified_service_name.trim(),
        country: request.country,
        ...(request.details !== undefined ? { details: request.details } : {}),
        ...(answer.service_category ? { serviceCategory: answer.service_category } : {}),
        ...(answer.country_code ? { countryCode: answer.country_code } : {}),
        ...(answer.region ? { region: answer.region } : {}),
        ...(answer.business_context ? { businessContext: answer.business_context } : {}),
        specificRequirements: answer.specific_requirements,
        technicalRequirements: answer.technical_requirements,
        complianceRequirements: answer.compliance_requirements,
        ...(answer.urgency_level ? { urgencyLevel: answer.urgency_level } : {}),
        ...(answer.budget_range ? { budgetRange: answer.budget_range } : {}),
        confidence,
        recommendations: answer.recommendations,
      };

      return {
        output: warnings.length > 0 ? { clarifiedRequest, warnings } : { clarifiedRequest },
      };
    });
  }
}
