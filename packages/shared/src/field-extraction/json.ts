/**
 * Lenient JSON parsing for model output.
 */

import { ExtractionError } from '../errors';

const CODE_FENCE = /^\s*```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```\s*$/;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the JSON object in a completion.
 *
 * Tries the whole text, then the body of a Markdown code fence, then the
 * span from the first `{` to the last `}`. Throws
 * ExtractionError('malformed_output') when none yields a JSON object.
 */
export function parseLlmJson(content: string): Record<string, unknown> {
  const candidates = [content];

  const fenced = CODE_FENCE.exec(content);
  if (fenced) {
    candidates.push(fenced[1]);
  }

  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(content.slice(start, end + 1));
  }

  let parsedNonObject = false;
  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (!parsed.ok) {
      continue;
    }
    if (isPlainObject(parsed.value)) {
      return parsed.value;
    }
    parsedNonObject = true;
  }

  throw new ExtractionError(
    'malformed_output',
    parsedNonObject ? 'LLM response is JSON but not an object' : 'LLM response is not valid JSON'
  );
}
