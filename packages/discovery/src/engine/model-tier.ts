/**
 * Model-tier selection: which backend model class serves each stage.
 */

import { ModelTier, type StageName } from "../state/types.js";

export type TaskCategory = "standard" | "analysis" | "search";

export interface TierFlags {
  /** USE_REASONING_MODEL_FOR_ANALYSIS */
  useReasoningForAnalysis: boolean;
  /** USE_REASONING_MODEL_FOR_COMPLEX_SEARCH */
  useReasoningForSearch: boolean;
}

export const STAGE_CATEGORIES: Readonly<Record<StageName, TaskCategory>> = {
  clarify: "standard",
  describe: "analysis",
  search: "search",
  benchmark: "analysis",
  report: "analysis",
};

const DECISION_TABLE: Readonly<
  Record<TaskCategory, (flags: TierFlags) => ModelTier>
> = {
  standard: () => ModelTier.STANDARD,
  analysis: (flags) =>
    flags.useReasoningForAnalysis ? ModelTier.REASONING : ModelTier.STANDARD,
  search: (flags) =>
    flags.useReasoningForSearch ? ModelTier.REASONING : ModelTier.STANDARD,
};

export function resolveTier(stage: StageName, flags: TierFlags): ModelTier {
  return DECISION_TABLE[STAGE_CATEGORIES[stage]](flags);
}
