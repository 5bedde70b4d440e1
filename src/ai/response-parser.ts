/**
 * AI response parsing with Zod validation.
 *
 * Model output is rarely clean JSON: it arrives in code fences, with
 * chatter around it, or truncated. The helpers here extract and repair
 * the JSON, then validate it against a schema.
 */

import { z } from 'zod';

/**
 * Extract a JSON value from raw model output.
 *
 * @throws SyntaxError when nothing parseable is found, even after repair.
 */
export function extractJsonFromResponse(raw: string): unknown {
  let cleaned = raw.trim();

  const fenced = cleaned.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (fenced) {
    cleaned = fenced[1].trim();
  }

  const objectSpan = cleaned.match(/\{[\s\S]*\}/);
  if (objectSpan) {
    cleaned = objectSpan[0];
  } else if (cleaned.includes('{')) {
    // Truncated output: keep everything from the first brace
    cleaned = cleaned.substring(cleaned.indexOf('{'));
  }

  try {
    return JSON.parse(cleaned);
  } catch {
    try {
      return JSON.parse(closeOpenStructures(cleaned));
    } catch {
      return JSON.parse(insertMissingClosers(cleaned));
    }
  }
}

/**
 * Parse model output and validate it against `schema`.
 *
 * @throws Error listing every schema issue, with the head of the raw text.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(raw: string, schema: S, label: string): z.infer<S> {
  const extracted = extractJsonFromResponse(raw);
  const result = schema.safeParse(extracted);
  if (!result.success) {
    const issues = result.error.errors
      .map((err) => `  - ${err.path.join('.') || '(root)'}: ${err.message}`)
      .join('\n');
    throw new Error(`${label} validation failed:\n${issues}\n\nRaw response:\n${raw.substring(0, 500)}`);
  }
  return result.data;
}

/**
 * Drop trailing commas and close any unclosed strings, arrays and objects
 * in nesting order.
 */
function closeOpenStructures(json: string): string {
  let repaired = json.replace(/,(\s*[}\]])/g, '$1');

  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of repaired) {
    if (escaped) {
      escaped = false;
    } else if (ch === '\\') {
      escaped = true;
    } else if (ch === '"') {
      inString = !inString;
    } else if (!inString) {
      if (ch === '{') stack.push('}');
      else if (ch === '[') stack.push(']');
      else if ((ch === '}' || ch === ']') && stack[stack.length - 1] === ch) stack.pop();
    }
  }

  if (inString) repaired += '"';
  repaired = repaired.replace(/,\s*$/, '');
  while (stack.length > 0) {
    repaired += stack.pop();
  }
  return repaired;
}

/**
 * For mismatched brackets: put missing `]` before the final `}` and
 * append missing `}`.
 */
function insertMissingClosers(json: string): string {
  let repaired = json.replace(/,(\s*[}\]])/g, '$1');
  const count = (pattern: RegExp): number => (repaired.match(pattern) ?? []).length;

  const missingBrackets = count(/\[/g) - count(/\]/g);
  const missingBraces = count(/\{/g) - count(/\}/g);

  if (missingBrackets > 0) {
    const lastBrace = repaired.lastIndexOf('}');
    const closers = ']'.repeat(missingBrackets);
    repaired = lastBrace >= 0
      ? repaired.substring(0, lastBrace) + closers + repaired.substring(lastBrace)
      : repaired + closers;
  }
  if (missingBraces > 0) {
    repaired += '}'.repeat(missingBraces);
  }
  return repaired;
}
