/**
 * Prompt builders. Each prompt names the exact JSON shape the matching
 * schema in `schemas.ts` expects.
 */

import type {
  ClarifiedRequest,
  ProcurementRequest,
  SearchHit,
  ServiceDescription,
  Vendor,
} from "../state/types.js";

function bullets(items: readonly string[], empty = "None specified"): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join("\n") : empty;
}

/** Numbered source list, with snippets trimmed to keep prompts bounded. */
export function formatSearchHits(hits: readonly SearchHit[], snippetLength = 400): string {
  if (hits.length === 0) return "No search results were found.";
  return hits
    .map((hit, i) => {
      const snippet =
        hit.snippet.length > snippetLength ? `${hit.snippet.slice(0, snippetLength)}...` : hit.snippet;
      return `[${i + 1}] ${hit.title}\nURL: ${hit.url}\n${snippet}`;
    })
    .join("\n\n");
}

export function clarificationPrompt(request: ProcurementRequest): string {
  return `Analyze this procurement request and clarify it so it is complete and actionable.

REQUEST:
- Service/Product: ${request.serviceName}
- Country: ${request.country}
- Additional details: ${request.details?.trim() || "None provided"}

Decide whether this is a legitimate business procurement request. Reject personal,
illegal or non-procurement requests. Standardize the service name, assign a broad
procurement category (e.g. "IT Services & Software", "Professional Services &
Consulting", "Facilities & Infrastructure"), normalize the country to an ISO code and
region, and extract requirements from the details.

Confidence guide: 0.9-1.0 complete and specific; 0.7-0.8 minor gaps; 0.5-0.6 needs
significant clarification; 0.3-0.4 poorly specified; below 0.3 not actionable.

Respond with JSON only:
{
  "is_valid_request": boolean,
  "clarified_service_name": string,
  "service_category": string,
  "country_code": string,
  "region": string,
  "specific_requirements": string[],
  "business_context": string,
  "urgency_level": "low" | "medium" | "high" | "critical",
  "budget_range": string,
  "technical_requirements": string[],
  "compliance_requirements": string[],
  "confidence_score": number,
  "recommendations": string[]
}`;
}

export function describeRequest(request: ClarifiedRequest): string {
  const lines = [
    `- Service: ${request.serviceName}`,
    `- Category: ${request.serviceCategory ?? "Unspecified"}`,
    `- Country/Region: ${request.countryCode ?? request.country}${request.region ? ` (${request.region})` : ""}`,
  ];
  if (request.businessContext) lines.push(`- Business context: ${request.businessContext}`);
  if (request.details) lines.push(`- Details: ${request.details}`);
  return lines.join("\n");
}

export function descriptionPrompt(request: ClarifiedRequest): string {
  return `Write a procurement-grade description of the service below.

CLARIFIED REQUEST:
${describeRequest(request)}

Specific requirements:
${bullets(request.specificRequirements)}

Technical requirements:
${bullets(request.technicalRequirements)}

Compliance requirements:
${bullets(request.complianceRequirements)}

Cover what the service is, how it is delivered, 5-10 key features, technical
specifications, common use cases, business benefits, implementation considerations,
applicable compliance standards, integration requirements and the main cost drivers.

Respond with JSON only:
{
  "service_overview": string,
  "detailed_description": string,
  "key_features": string[],
  "technical_specifications": string[],
  "use_cases": string[],
  "benefits": string[],
  "implementation_considerations": string[],
  "compliance_standards": string[],
  "integration_requirements": string[],
  "cost_factors": string[]
}`;
}

export function vendorPrompt(
  request: ClarifiedRequest,
  description: ServiceDescription,
  hits: readonly SearchHit[],
): string {
  return `Identify the global vendors best suited to supply this service, using the search
results as evidence.

CLARIFIED REQUEST:
${describeRequest(request)}

SERVICE OVERVIEW:
${description.overview}

KEY FEATURES:
${bullets(description.keyFeatures)}

SEARCH RESULTS:
${formatSearchHits(hits)}

Score each vendor 0-100 for fit with the request (capability, market position, regional
presence). List each vendor once.

Respond with JSON only:
{
  "vendors": [
    {
      "name": string,
      "score": number,
      "strengths": string[],
      "weaknesses": string[],
      "fit_notes": string,
      "website": string | null,
      "headquarters": string | null,
      "market_position": string | null
    }
  ]
}`;
}

export function partnerPrompt(
  request: ClarifiedRequest,
  vendors: readonly Vendor[],
  hits: readonly SearchHit[],
): string {
  const vendorNames = vendors.map((v) => v.name);
  return `Identify regional partners (resellers, integrators, managed service providers)
that can deliver this service in ${request.country}.

CLARIFIED REQUEST:
${describeRequest(request)}

VENDORS ALREADY IDENTIFIED:
${bullets(vendorNames, "None")}

SEARCH RESULTS:
${formatSearchHits(hits)}

Score each partner 0-100 for local delivery capability and fit. Prefer partners with
a relationship to the vendors above and name that relationship.

Respond with JSON only:
{
  "partners": [
    {
      "name": string,
      "score": number,
      "vendor_relationship": string,
      "location": string,
      "specializations": string[],
      "fit_notes": string,
      "website": string | null
    }
  ]
}`;
}

export function benchmarkPrompt(
  request: ClarifiedRequest,
  description: ServiceDescription,
  vendors: readonly Vendor[],
  hits: readonly SearchHit[],
): string {
  return `Estimate typical market pricing for this service in ${request.country}.

CLARIFIED REQUEST:
${describeRequest(request)}
- Budget range given: ${request.budgetRange ?? "Not specified"}

KNOWN COST FACTORS:
${bullets(description.costFactors)}

LEADING VENDORS:
${bullets(vendors.slice(0, 5).map((v) => v.name), "None")}

PRICING SEARCH RESULTS:
${formatSearchHits(hits)}

Give a low-high price range in one currency for a typical engagement, the usual pricing
model (e.g. per user per month, per TB per month, fixed fee), the factors that move the
price, and negotiation recommendations. price_range_low must not exceed
price_range_high.

Respond with JSON only:
{
  "price_range_low": number,
  "price_range_high": number,
  "currency": string,
  "pricing_model": string,
  "cost_factors": string[],
  "market_average": number | null,
  "recommendations": string[]
}`;
}

// ---------- search queries ----------

export function vendorQueries(request: ClarifiedRequest): string[] {
  const service = request.serviceName;
  const category = request.serviceCategory ?? service;
  return [
    `top ${service} vendors ${new Date().getUTCFullYear()}`,
    `leading ${category} providers market share comparison`,
    `${service} enterprise solutions comparison reviews`,
  ];
}

export function partnerQueries(request: ClarifiedRequest): string[] {
  const service = request.serviceName;
  return [
    `${service} partners resellers in ${request.country}`,
    `${service} implementation services ${request.country}`,
    `${service} managed service provider ${request.region ?? request.country}`,
  ];
}

export function pricingQueries(request: ClarifiedRequest): string[] {
  const service = request.serviceName;
  return [
    `${service} pricing ${request.country}`,
    `${service} cost per month benchmark`,
  ];
}
