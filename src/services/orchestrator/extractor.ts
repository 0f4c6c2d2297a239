// Output Extractor
// Recovers the JSON document from a model answer that may carry prose or markdown fences

import { MalformedOutputError } from './errors.js';

export type ExtractMode = 'object' | 'array';

const JSON_FENCE = '```json';
const FENCE = '```';

function stripFences(text: string): string {
  const jsonStart = text.indexOf(JSON_FENCE);
  if (jsonStart !== -1) {
    const body = text.slice(jsonStart + JSON_FENCE.length);
    const end = body.indexOf(FENCE);
    return end === -1 ? body : body.slice(0, end);
  }

  const start = text.indexOf(FENCE);
  if (start !== -1) {
    const body = text.slice(start + FENCE.length);
    const end = body.indexOf(FENCE);
    return end === -1 ? body : body.slice(0, end);
  }

  return text;
}

export function extractJson(rawText: string, mode: ExtractMode = 'object'): unknown {
  const text = stripFences(rawText.trim());
  const [open, close] = mode === 'array' ? ['[', ']'] : ['{', '}'];

  const first = text.indexOf(open);
  const last = text.lastIndexOf(close);
  if (first === -1 || last === -1 || last < first) {
    throw new MalformedOutputError(`No JSON ${mode} found in model output`, rawText.trim().slice(0, 500));
  }

  const fragment = text.slice(first, last + 1);
  try {
    const parsed: unknown = JSON.parse(fragment);
    return parsed;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedOutputError(`Model output is not valid JSON: ${reason}`, fragment);
  }
}
