/**
 * Application configuration, read once from the environment at startup and
 * passed explicitly to everything that needs it.
 */

import { z } from "zod";
import {
  ConfigurationError,
  DEFAULT_AZURE_API_VERSION,
} from "@procurement-scout/llm-client";
import type { TierFlags } from "./engine/model-tier.js";

export type LlmProvider = "openai" | "azure_openai";

export interface LlmConfig {
  provider: LlmProvider;
  apiKey: string;
  baseUrl: string;
  azureEndpoint?: string;
  azureApiVersion: string;
  standardModel: string;
  reasoningModel: string;
  temperature: number;
  maxTokens: number;
  reasoningMaxTokens: number;
  timeoutMs: number;
}

export interface SearchConfig {
  apiKey: string;
  maxResults: number;
  maxQueries: number;
  timeoutMs: number;
}

export interface WorkflowConfig {
  maxRetries: number;
  timeoutMs: number;
  maxConcurrentRequests: number;
}

export interface AppConfig {
  llm: LlmConfig;
  tiers: TierFlags;
  search: SearchConfig;
  workflow: WorkflowConfig;
}

// ---------- Environment schema ----------

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"], {
    errorMap: () => ({ message: "expected true or false" }),
  })
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();
// Node timers overflow past 2^31 - 1 ms and fire immediately.
const MAX_TIMER_SECONDS = 2_147_483;
const seconds = z.coerce
  .number()
  .positive()
  .max(MAX_TIMER_SECONDS, `must be at most ${MAX_TIMER_SECONDS} seconds`)
  .transform((s) => Math.round(s * 1000));

const envSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "azure_openai"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com"),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_API_VERSION: z.string().default(DEFAULT_AZURE_API_VERSION),
  LLM_MODEL: z.string().default("gpt-4o"),
  REASONING_MODEL: z.string().default("o3-mini"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: positiveInt.default(2000),
  REASONING_MAX_TOKENS: positiveInt.default(4000),
  LLM_TIMEOUT: seconds.default(60),
  USE_REASONING_MODEL_FOR_ANALYSIS: flag.default("true"),
  USE_REASONING_MODEL_FOR_COMPLEX_SEARCH: flag.default("true"),
  TAVILY_API_KEY: z.string({ required_error: "required" }),
  SEARCH_MAX_RESULTS: positiveInt.default(10),
  MAX_SEARCH_QUERIES: positiveInt.default(5),
  SEARCH_TIMEOUT: seconds.default(30),
  WORKFLOW_MAX_RETRIES: positiveInt.default(3),
  WORKFLOW_TIMEOUT: seconds.default(300),
  MAX_CONCURRENT_REQUESTS: positiveInt.default(10),
});

/** Credentials whose requirement depends on the selected provider. */
function providerProblems(env: Record<string, string>): string[] {
  const required =
    env["LLM_PROVIDER"] === "azure_openai"
      ? ["AZURE_OPENAI_API_KEY", "AZURE_OPENAI_ENDPOINT"]
      : env["LLM_PROVIDER"] === undefined || env["LLM_PROVIDER"] === "openai"
        ? ["OPENAI_API_KEY"]
        : [];
  const provider = env["LLM_PROVIDER"] ?? "openai";
  return required
    .filter((name) => env[name] === undefined)
    .map((name) => `${name}: required when LLM_PROVIDER is ${provider}`);
}

/** Blank variables count as unset. */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }
  return cleaned;
}

/**
 * Build the frozen application config.
 *
 * @throws {ConfigurationError} listing every invalid or missing variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Readonly<AppConfig> {
  const cleaned = withoutBlanks(env);
  const parsed = envSchema.safeParse(cleaned);
  const problems = [
    ...providerProblems(cleaned),
    ...(parsed.success
      ? []
      : parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)),
  ];
  if (!parsed.success || problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  const e = parsed.data;

  const isAzure = e.LLM_PROVIDER === "azure_openai";
  const config: AppConfig = {
    llm: {
      provider: e.LLM_PROVIDER,
      apiKey: (isAzure ? e.AZURE_OPENAI_API_KEY : e.OPENAI_API_KEY) ?? "",
      baseUrl: e.OPENAI_BASE_URL,
      ...(e.AZURE_OPENAI_ENDPOINT ? { azureEndpoint: e.AZURE_OPENAI_ENDPOINT } : {}),
      azureApiVersion: e.AZURE_OPENAI_API_VERSION,
      standardModel: e.LLM_MODEL,
      reasoningModel: e.REASONING_MODEL,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
      reasoningMaxTokens: e.REASONING_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT,
    },
    tiers: {
      useReasoningForAnalysis: e.USE_REASONING_MODEL_FOR_ANALYSIS,
      useReasoningForSearch: e.USE_REASONING_MODEL_FOR_COMPLEX_SEARCH,
    },
    search: {
      apiKey: e.TAVILY_API_KEY,
      maxResults: e.SEARCH_MAX_RESULTS,
      maxQueries: e.MAX_SEARCH_QUERIES,
      timeoutMs: e.SEARCH_TIMEOUT,
    },
    workflow: {
      maxRetries: e.WORKFLOW_MAX_RETRIES,
      timeoutMs: e.WORKFLOW_TIMEOUT,
      maxConcurrentRequests: e.MAX_CONCURRENT_REQUESTS,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object") deepFreeze(child);
  }
  return Object.freeze(value);
}
