/**
 * Typed extraction of JSON embedded in model output.
 *
 * Candidates are tried in order of specificity: the whole text, fenced
 * ```json blocks, the outermost {...} object, the outermost [...] array.
 * The first candidate that parses and satisfies the schema wins.
 */

import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ParseError } from "../errors.js";
import { err, ok, type Result } from "../result.js";

export function collectJsonCandidates(text: string): string[] {
  const candidates: string[] = [];
  const trimmed = text.trim();
  if (trimmed === "") return candidates;

  candidates.push(trimmed);

  const fencedPattern = /```(?:json)?\s*\n([\s\S]*?)```/g;
  let match: RegExpExecArray | null;
  while ((match = fencedPattern.exec(text)) !== null) {
    const blockContent = match[1];
    if (blockContent) {
      candidates.push(blockContent.trim());
    }
  }

  const braceMatch = trimmed.match(/\{[\s\S]*\}/);
  if (braceMatch) {
    candidates.push(braceMatch[0]);
  }

  const bracketMatch = trimmed.match(/\[[\s\S]*\]/);
  if (bracketMatch) {
    candidates.push(bracketMatch[0]);
  }

  return candidates;
}

function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "schema mismatch";
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

/**
 * Parse `text` into `T`, reporting why when it cannot.
 *
 * @param label - What was being parsed, used in the error message.
 */
export function parseModelJson<T>(
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string,
): Result<T, ParseError> {
  const candidates = collectJsonCandidates(text);
  let lastZodError: ZodError | undefined;
  let sawJson = false;

  for (const candidate of candidates) {
    let json: unknown;
    try {
      json = JSON.parse(candidate);
    } catch {
      continue;
    }
    sawJson = true;
    const parsed = schema.safeParse(json);
    if (parsed.success) return ok(parsed.data);
    lastZodError = parsed.error;
  }

  if (!sawJson) {
    const reason = text.trim() === "" ? "empty response" : "no JSON found";
    return err(new ParseError(`Could not parse ${label}: ${reason}`, { raw: text }));
  }
  return err(
    new ParseError(
      `Could not parse ${label}: ${lastZodError ? describeIssue(lastZodError) : "schema mismatch"}`,
      { raw: text, cause: lastZodError },
    ),
  );
}
