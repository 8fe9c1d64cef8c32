const TAGGED_FENCE = "```json";
const FENCE = "```";

/**
 * Strips a Markdown code fence around a model reply.
 * "```json" takes the text up to the next fence; a bare "```" takes the text
 * between the first and the last fence. Anything else is returned trimmed.
 */
export function extractJsonText(text: string): string {
  const trimmed = text.trim();

  const tagged = trimmed.indexOf(TAGGED_FENCE);
  if (tagged !== -1) {
    const start = tagged + TAGGED_FENCE.length;
    const end = trimmed.indexOf(FENCE, start);
    return (end === -1 ? trimmed.slice(start) : trimmed.slice(start, end)).trim();
  }

  const fence = trimmed.indexOf(FENCE);
  if (fence !== -1) {
    const start = fence + FENCE.length;
    const end = trimmed.lastIndexOf(FENCE);
    return (end > fence ? trimmed.slice(start, end) : trimmed.slice(start)).trim();
  }

  return trimmed;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(extractJsonText(text));
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
