/**
 * JSON coercion for model output.
 *
 * Models are asked to reply with bare JSON but regularly wrap it in a markdown
 * fence or add a sentence around it. These helpers recover the JSON document
 * and validate it against a zod schema.
 */

import type { z } from "zod";

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

export type ModelParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Return the content of the first markdown code fence, or the trimmed input
 * when there is none.
 */
export function stripCodeFence(raw: string): string {
  const match = FENCE_PATTERN.exec(raw);
  return (match ? match[1] : raw).trim();
}

/**
 * Parse model output as JSON. Throws SyntaxError when no JSON document can be
 * recovered.
 */
export function parseModelJson(raw: string): unknown {
  const candidate = stripCodeFence(raw);
  try {
    return JSON.parse(candidate);
  } catch (err) {
    const start = candidate.indexOf("{");
    const end = candidate.lastIndexOf("}");
    if (start >= 0 && end > start) {
      return JSON.parse(candidate.slice(start, end + 1));
    }
    throw err;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse and validate model output in one step. Never throws.
 */
export function parseModelOutput<S extends z.ZodTypeAny>(raw: string, schema: S): ModelParseResult<z.output<S>> {
  let json: unknown;
  try {
    json = parseModelJson(raw);
  } catch (err) {
    return { ok: false, error: `Invalid JSON: ${(err as Error).message}` };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: describeIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data };
}
