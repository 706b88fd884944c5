/**
 * Search: discover global vendors and regional partners.
 *
 * Vendor and partner queries run concurrently through the search client.
 * The model then extracts vendors from the vendor hits and partners from the
 * partner hits; duplicates are merged by normalized name and both lists are
 * ranked best fit first.
 */

import type { SearchKind } from "../adapters/search-client.js";
import { PreconditionError } from "../errors.js";
import type { Partner, SearchHit, Vendor } from "../state/types.js";
import type { WorkflowState } from "../state/workflow-state.js";
import { parseModelJson } from "./parse.js";
import { partnerPrompt, partnerQueries, vendorPrompt, vendorQueries } from "./prompts.js";
import { partnerListSchema, vendorListSchema } from "./schemas.js";
import {
  guard,
  unwrap,
  type StageContext,
  type StageDeps,
  type StageHandler,
  type StageResult,
} from "./stage.js";

export type QueryKind = Exclude<SearchKind, "pricing">;

export interface PlannedQuery {
  kind: QueryKind;
  query: string;
}

/**
 * Interleave vendor and partner queries, drop repeats (case-insensitive)
 * and keep at most `maxQueries`, so both kinds survive a small cap.
 */
export function planQueries(
  vendor: readonly string[],
  partner: readonly string[],
  maxQueries: number,
): PlannedQuery[] {
  const planned: PlannedQuery[] = [];
  const seen = new Set<string>();
  const longest = Math.max(vendor.length, partner.length);
  for (let i = 0; i < longest; i++) {
    for (const [kind, list] of [["vendor", vendor], ["partner", partner]] as const) {
      const query = list[i]?.trim();
      if (!query) continue;
      const key = query.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      planned.push({ kind, query });
    }
  }
  return planned.slice(0, maxQueries);
}

/** Keep the first hit for each URL. */
export function dedupeHits(hits: readonly SearchHit[]): SearchHit[] {
  const seen = new Set<string>();
  const unique: SearchHit[] = [];
  for (const hit of hits) {
    if (seen.has(hit.url)) continue;
    seen.add(hit.url);
    unique.push(hit);
  }
  return unique;
}

const LEGAL_SUFFIX = /\b(inc|llc|ltd|limited|corp|corporation|co|gmbh|plc|ag|sa|bv)\b/g;

/** "Acme, Inc." and "ACME" normalize to the same key. */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(LEGAL_SUFFIX, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function union(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])];
}

function byScore<T extends { score: number }>(a: T, b: T): number {
  return b.score - a.score;
}

/**
 * Merge records sharing a normalized name. The first record's identity wins;
 * the higher score and the union of list fields are kept. Sorted by
 * descending score, ties in first-seen order.
 */
export function mergeVendors(vendors: readonly Vendor[]): Vendor[] {
  const merged = new Map<string, Vendor>();
  for (const vendor of vendors) {
    const key = normalizeName(vendor.name) || vendor.name;
    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, { ...vendor });
      continue;
    }
    merged.set(key, {
      ...vendor,
      ...existing,
      score: Math.max(existing.score, vendor.score),
      strengths: union(existing.strengths, vendor.strengths),
      weaknesses: union(existing.weaknesses, vendor.weaknesses),
    });
  }
  return [...merged.values()].sort(byScore);
}

export function mergePartners(partners: readonly Partner[]): Partner[] {
  const merged = new Map<string, Partner>();
  for (const partner of partners) {
    const key = normalizeName(partner.name) || partner.name;
    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, { ...partner });
      continue;
    }
    merged.set(key, {
      ...partner,
      ...existing,
      score: Math.max(existing.score, partner.score),
      specializations: union(existing.specializations, partner.specializations),
    });
  }
  return [...merged.values()].sort(byScore);
}

export class SearchStage implements StageHandler<"search"> {
  readonly name = "search";

  constructor(private readonly deps: StageDeps) {}

  execute(state: WorkflowState, ctx: StageContext): Promise<StageResult<"search">> {
    return guard(async () => {
      const request = state.clarifiedRequest;
      const description = state.serviceDescription;
      if (!request || !description) {
        throw new PreconditionError(
          "Search needs a clarified request and a service description",
          "search",
        );
      }

      const { maxQueries, maxResults } = this.deps.config.search;
      const planned = planQueries(vendorQueries(request), partnerQueries(request), maxQueries);

      const results = await Promise.all(
        planned.map(async (p) => ({
          kind: p.kind,
          hits: await this.deps.search.search(p.query, maxResults, {
            kind: p.kind,
            signal: ctx.signal,
          }),
        })),
      );

      const hitsOf = (kind: QueryKind) =>
        dedupeHits(results.filter((r) => r.kind === kind).flatMap((r) => r.hits));
      const vendorHits = hitsOf("vendor");
      const partnerHits = hitsOf("partner");

      const vendorRaw = await this.deps.llm.complete(
        ctx.tier,
        vendorPrompt(request, description, vendorHits),
        undefined,
        ctx.signal,
      );
      const vendors = mergeVendors(
        unwrap(parseModelJson(vendorRaw, vendorListSchema, "vendor list")).vendors,
      );

      const partnerRaw = await this.deps.llm.complete(
        ctx.tier,
        partnerPrompt(request, vendors, partnerHits),
        undefined,
        ctx.signal,
      );
      const partners = mergePartners(
        unwrap(parseModelJson(partnerRaw, partnerListSchema, "partner list")).partners,
      );

      return {
        output: {
          vendors,
          partners,
          searchMetadata: {
            queries: planned.map((p) => p.query),
            sources: dedupeHits(results.flatMap((r) => r.hits)).map((hit) => hit.url),
          },
        },
      };
    });
  }
}
