import type { ParsedResponse } from './types.js';

// Only a fence wrapping the whole response counts; fences inside string values stay.
const FENCE_PATTERN = /^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/;

export function stripCodeFences(raw: string): string {
  const text = raw.trim();
  const match = text.match(FENCE_PATTERN);
  return match ? match[1].trim() : text;
}

/** Narrows model output to the outermost `{...}` span, dropping fences and chatter. */
export function extractJsonText(raw: string): string | null {
  const text = stripCodeFences(raw);
  const startIdx = text.indexOf('{');
  const endIdx = text.lastIndexOf('}');
  if (startIdx === -1 || endIdx <= startIdx) {
    return null;
  }
  return text.slice(startIdx, endIdx + 1);
}

export function parseJsonResponse(raw: string): ParsedResponse {
  const jsonText = extractJsonText(raw);
  if (jsonText === null) {
    return { ok: false, error: 'Response does not contain a JSON object' };
  }

  try {
    return { ok: true, value: JSON.parse(jsonText) };
  } catch (e) {
    return {
      ok: false,
      error: `Response is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
    };
  }
}
