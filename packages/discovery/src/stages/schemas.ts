/**
 * Zod schemas for the JSON each prompt asks the model to return, and the
 * mapping from that wire shape to the domain records.
 */

import { z } from "zod";
import type {
  Partner,
  PriceBenchmark,
  ServiceDescription,
  Vendor,
} from "../state/types.js";

const list = z.array(z.string()).default([]);
const text = z.string().default("");
const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));
/** A JSON number, or a numeric string. null and "" are rejected, not read as 0. */
const numeric = z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]);
const amount = numeric.pipe(z.number().nonnegative());
const score = numeric.transform((n) => Math.min(100, Math.max(0, n)));

// ---------- clarify ----------

export const clarificationSchema = z.object({
  is_valid_request: z.boolean(),
  clarified_service_name: z.string().min(1),
  service_category: optionalText,
  country_code: optionalText,
  region: optionalText,
  specific_requirements: list,
  business_context: optionalText,
  urgency_level: optionalText,
  budget_range: optionalText,
  technical_requirements: list,
  compliance_requirements: list,
  confidence_score: numeric.pipe(z.number().min(0).max(1)),
  recommendations: list,
});

export type ClarificationResponse = z.infer<typeof clarificationSchema>;

// ---------- describe ----------

export const descriptionSchema = z
  .object({
    service_overview: z.string().min(1),
    detailed_description: text,
    key_features: list,
    technical_specifications: list,
    use_cases: list,
    benefits: list,
    implementation_considerations: list,
    compliance_standards: list,
    integration_requirements: list,
    cost_factors: list,
  })
  .transform(
    (d): ServiceDescription => ({
      overview: d.service_overview,
      detailedDescription: d.detailed_description,
      keyFeatures: d.key_features,
      technicalSpecifications: d.technical_specifications,
      useCases: d.use_cases,
      benefits: d.benefits,
      implementationConsiderations: d.implementation_considerations,
      complianceStandards: d.compliance_standards,
      integrationRequirements: d.integration_requirements,
      costFactors: d.cost_factors,
    }),
  );

// ---------- search ----------

const vendorSchema = z
  .object({
    name: z.string().min(1),
    score,
    strengths: list,
    weaknesses: list,
    fit_notes: text,
    website: optionalText,
    headquarters: optionalText,
    market_position: optionalText,
  })
  .transform(
    (v): Vendor => ({
      name: v.name.trim(),
      score: v.score,
      strengths: v.strengths,
      weaknesses: v.weaknesses,
      fitNotes: v.fit_notes,
      ...(v.website ? { website: v.website } : {}),
      ...(v.headquarters ? { headquarters: v.headquarters } : {}),
      ...(v.market_position ? { marketPosition: v.market_position } : {}),
    }),
  );

export const vendorListSchema = z.object({ vendors: z.array(vendorSchema) });

const partnerSchema = z
  .object({
    name: z.string().min(1),
    score,
    vendor_relationship: text,
    location: text,
    specializations: list,
    fit_notes: text,
    website: optionalText,
  })
  .transform(
    (p): Partner => ({
      name: p.name.trim(),
      score: p.score,
      vendorRelationship: p.vendor_relationship,
      location: p.location,
      specializations: p.specializations,
      fitNotes: p.fit_notes,
      ...(p.website ? { website: p.website } : {}),
    }),
  );

export const partnerListSchema = z.object({ partners: z.array(partnerSchema) });

// ---------- benchmark ----------

export const benchmarkSchema = z
  .object({
    price_range_low: amount,
    price_range_high: amount,
    currency: z.string().min(1),
    pricing_model: text,
    cost_factors: list,
    market_average: amount.nullish(),
    recommendations: list,
  })
  .transform(
    (b): PriceBenchmark => ({
      low: b.price_range_low,
      high: b.price_range_high,
      currency: b.currency.trim().toUpperCase(),
      pricingModel: b.pricing_model,
      costFactors: b.cost_factors,
      ...(b.market_average != null ? { marketAverage: b.market_average } : {}),
      recommendations: b.recommendations,
    }),
  );
