import { PreconditionError } from "../errors.js";
import type { WorkflowState } from "../state/workflow-state.js";
import { parseModelJson } from "./parse.js";
import { descriptionPrompt } from "./prompts.js";
import { descriptionSchema } from "./schemas.js";
import {
  guard,
  unwrap,
  type StageContext,
  type StageDeps,
  type StageHandler,
  type StageResult,
} from "./stage.js";

/** Describe: a structured description of the clarified service. */
export class DescribeStage implements StageHandler<"describe"> {
  readonly name = "describe";

  constructor(private readonly deps: StageDeps) {}

  execute(state: WorkflowState, ctx: StageContext): Promise<StageResult<"describe">> {
    return guard(async () => {
      const request = state.clarifiedRequest;
      if (!request) {
        throw new PreconditionError("Describe needs a clarified request", "describe");
      }
      const raw = await this.deps.llm.complete(
        ctx.tier,
        descriptionPrompt(request),
        undefined,
        ctx.signal,
      );
      const serviceDescription = unwrap(
        parseModelJson(raw, descriptionSchema, "service description"),
      );
      return { output: { serviceDescription } };
    });
  }
}
