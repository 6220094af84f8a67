import type { z } from 'zod';

/** Remove a surrounding markdown code fence, with or without a `json` tag. */
export function stripCodeFences(raw: string): string {
  let content = raw.trim();
  if (content.startsWith('```json')) {
    content = content.replace(/^```json\s*/i, '').replace(/\s*```\s*$/, '');
  } else if (content.startsWith('```')) {
    content = content.replace(/^```\s*/, '').replace(/\s*```\s*$/, '');
  }
  return content.trim();
}

/**
 * Extract the first complete JSON object or array from a string (models often
 * add prose before or after the JSON). Returns the input unchanged when no
 * balanced value is found.
 */
export function extractFirstJsonValue(content: string): string {
  const objectStart = content.indexOf('{');
  const arrayStart = content.indexOf('[');
  const start =
    objectStart === -1 ? arrayStart : arrayStart === -1 ? objectStart : Math.min(objectStart, arrayStart);
  if (start === -1) return content;

  let depth = 1;
  let i = start + 1;
  const len = content.length;
  while (i < len && depth > 0) {
    const c = content[i];
    if (c === '"') {
      i++;
      while (i < len) {
        const q = content[i];
        if (q === '\\') {
          i += 2;
          continue;
        }
        if (q === '"') {
          i++;
          break;
        }
        i++;
      }
      continue;
    }
    if (c === '{' || c === '[') depth++;
    else if (c === '}' || c === ']') depth--;
    i++;
  }
  return depth === 0 ? content.slice(start, i) : content;
}

/**
 * Parse a raw model response and validate it against `schema`.
 * Throws on invalid JSON or on schema issues (joined as `path: message`).
 */
export function parseAndValidate<T extends z.ZodTypeAny>(rawContent: string, schema: T, schemaName = 'response'): z.infer<T> {
  const jsonOnly = extractFirstJsonValue(stripCodeFences(rawContent));

  let json: unknown;
  try {
    json = JSON.parse(jsonOnly);
  } catch (e) {
    throw new Error(`Invalid JSON from LLM for ${schemaName}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`LLM response validation failed for ${schemaName}: ${issues}`);
  }
  return result.data;
}
