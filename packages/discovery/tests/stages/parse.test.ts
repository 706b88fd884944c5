import { describe, it, expect } from "vitest";
import { z } from "zod";
import { collectJsonCandidates, parseModelJson } from "../../src/stages/parse.js";
import { ParseError } from "../../src/errors.js";

const schema = z.object({ name: z.string(), score: z.number() });

describe("collectJsonCandidates", () => {
  it("returns nothing for blank text", () => {
    expect(collectJsonCandidates("   ")).toEqual([]);
  });

  it("tries the whole text, fenced blocks, then braces", () => {
    const text = 'Result:\n```json\n{"a": 1}\n```';
    expect(collectJsonCandidates(text)).toEqual([
      text.trim(),
      '{"a": 1}',
      '{"a": 1}',
    ]);
  });
});

describe("parseModelJson", () => {
  it("parses bare JSON", () => {
    const result = parseModelJson('{"name": "Contoso", "score": 90}', schema, "vendor");
    expect(result).toEqual({ ok: true, value: { name: "Contoso", score: 90 } });
  });

  it("parses JSON inside a fenced block", () => {
    const result = parseModelJson(
      'Sure!\n```json\n{"name": "Contoso", "score": 90}\n```\nAnything else?',
      schema,
      "vendor",
    );
    expect(result.ok && result.value.name).toBe("Contoso");
  });

  it("parses JSON surrounded by prose", () => {
    const result = parseModelJson('The answer is {"name": "A", "score": 1} as requested.', schema, "vendor");
    expect(result.ok && result.value.score).toBe(1);
  });

  it("reports an empty response", () => {
    const result = parseModelJson("", schema, "vendor");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error.message).toBe("Could not parse vendor: empty response");
    }
  });

  it("reports text with no JSON", () => {
    const result = parseModelJson("I cannot help with that.", schema, "vendor");
    expect(!result.ok && result.error.message).toBe("Could not parse vendor: no JSON found");
  });

  it("reports the first schema violation", () => {
    const result = parseModelJson('{"name": "A", "score": "high"}', schema, "vendor");
    expect(!result.ok && result.error.message).toBe(
      "Could not parse vendor: score: Expected number, received string",
    );
  });

  it("keeps the raw text on the error", () => {
    const result = parseModelJson("nope", schema, "vendor");
    expect(!result.ok && result.error.raw).toBe("nope");
  });

  it("is never retryable", () => {
    const result = parseModelJson("nope", schema, "vendor");
    expect(!result.ok && result.error.retryable).toBe(false);
  });
});
