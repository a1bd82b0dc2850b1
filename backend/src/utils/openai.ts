import type { z } from 'zod';

/** Index of the brace closing the object that opens at `start`, skipping braces inside strings. */
function closingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') {
        i += 1;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Parses the first `{...}` object in a model reply, ignoring markdown fences
 * and any prose before or after it.
 */
export function extractJsonObject(raw: string): unknown {
  const start = raw.indexOf('{');
  const end = start === -1 ? -1 : closingBrace(raw, start);
  if (end === -1) {
    throw new SyntaxError('Model output does not contain a JSON object.');
  }
  return JSON.parse(raw.slice(start, end + 1));
}

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export function parseModelJson<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseOutcome<T> {
  let candidate: unknown;
  try {
    candidate = extractJsonObject(raw);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }

  const parsed = schema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || '(root)';
    return { ok: false, error: `Invalid model output at ${path}: ${issue?.message ?? 'unknown issue'}` };
  }
  return { ok: true, value: parsed.data };
}
