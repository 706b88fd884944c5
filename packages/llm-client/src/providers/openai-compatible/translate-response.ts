/**
 * Translate a Chat Completions API response into a CompletionResponse.
 */

import {
  InvalidRequestError,
  type CompletionResponse,
  type FinishReason,
} from "../../types/index.js";
import { isRecord } from "../../utils/index.js";

function mapFinishReason(raw: unknown): FinishReason {
  switch (raw) {
    case "stop":
    case "length":
    case "tool_calls":
    case "content_filter":
      return raw;
    default:
      return "other";
  }
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

/**
 * @throws {InvalidRequestError} when the body is not a chat completion.
 */
export function translateResponse(raw: unknown, providerName: string): CompletionResponse {
  const choices: unknown = isRecord(raw) ? raw["choices"] : undefined;
  if (!isRecord(raw) || !Array.isArray(choices)) {
    throw new InvalidRequestError(
      `${providerName} returned a response without choices`,
      { provider: providerName, raw: isRecord(raw) ? raw : undefined },
    );
  }

  const choice: unknown = choices[0];
  const message = isRecord(choice) ? choice["message"] : undefined;
  const text = isRecord(message) ? stringOr(message["content"], "") : "";
  const rawUsage = raw["usage"];
  const usage: Record<string, unknown> = isRecord(rawUsage) ? rawUsage : {};

  return {
    id: stringOr(raw["id"], ""),
    model: stringOr(raw["model"], ""),
    provider: providerName,
    text,
    finish_reason: mapFinishReason(isRecord(choice) ? choice["finish_reason"] : undefined),
    usage: {
      input_tokens: numberOr(usage["prompt_tokens"], 0),
      output_tokens: numberOr(usage["completion_tokens"], 0),
    },
  };
}
