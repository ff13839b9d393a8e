/**
 * Helpers for handling raw model output.
 * Pure functions; no knowledge of the ontology.
 */

const REASONING_TAGS = ['think', 'thinking', 'reasoning', 'internal'];

const REASONING_PATTERNS = REASONING_TAGS.map(
  (tag) => new RegExp(`<${tag}>[\\s\\S]*?</${tag}>`, 'g')
);

/**
 * Remove reasoning blocks some models emit before their answer,
 * e.g. `<think>…</think>`.
 */
export function stripReasoningTags(text: string): string {
  let cleaned = text;
  for (const pattern of REASONING_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }
  return cleaned.trim();
}

/**
 * Greedy match from the first `{` to the last `}`.
 * Returns null when the text holds no brace pair.
 */
export function extractJsonObject(text: string): string | null {
  const match = /\{[\s\S]*\}/.exec(text);
  return match ? match[0] : null;
}

/** Parse the first JSON object found in the text; null if none parses. */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  const candidate = extractJsonObject(text);
  if (candidate === null) return null;

  try {
    const parsed: unknown = JSON.parse(candidate);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** "return_on_investment" → "Return On Investment" */
export function titleCase(id: string): string {
  return id
    .split(/[_\s-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** Single-line excerpt of at most `length` characters. */
export function snippet(text: string, length: number): string {
  return text.slice(0, length).replace(/\s*\n+\s*/g, ' ').trim();
}

/** Round to one decimal place. */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
