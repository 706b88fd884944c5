import { ParseError, PreconditionError } from "../errors.js";
import type { WorkflowState } from "../state/workflow-state.js";
import { parseModelJson } from "./parse.js";
import { benchmarkPrompt, pricingQueries } from "./prompts.js";
import { benchmarkSchema } from "./schemas.js";
import { dedupeHits } from "./search.js";
import {
  guard,
  unwrap,
  type StageContext,
  type StageDeps,
  type StageHandler,
  type StageResult,
} from "./stage.js";

/** Benchmark: market price range for the service in the request's country. */
export class BenchmarkStage implements StageHandler<"benchmark"> {
  readonly name = "benchmark";

  constructor(private readonly deps: StageDeps) {}

  execute(state: WorkflowState, ctx: StageContext): Promise<StageResult<"benchmark">> {
    return guard(async () => {
      const request = state.clarifiedRequest;
      const description = state.serviceDescription;
      const vendors = state.vendors;
      if (!request || !description || !vendors) {
        throw new PreconditionError(
          "Benchmark needs a clarified request, a service description and vendor results",
          "benchmark",
        );
      }

      const { maxQueries, maxResults } = this.deps.config.search;
      const queries = [...new Set(pricingQueries(request))].slice(0, maxQueries);
      const hits = dedupeHits(
        (
          await Promise.all(
            queries.map((query) =>
              this.deps.search.search(query, maxResults, { kind: "pricing", signal: ctx.signal }),
            ),
          )
        ).flat(),
      );

      const raw = await this.deps.llm.complete(
        ctx.tier,
        benchmarkPrompt(request, description, vendors, hits),
        undefined,
        ctx.signal,
      );
      const priceBenchmark = unwrap(parseModelJson(raw, benchmarkSchema, "price benchmark"));
      if (priceBenchmark.low > priceBenchmark.high) {
        throw new ParseError(
          `Could not parse price benchmark: low (${priceBenchmark.low}) exceeds high (${priceBenchmark.high})`,
          { raw },
        );
      }
      return { output: { priceBenchmark } };
    });
  }
}
