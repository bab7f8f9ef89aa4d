export function parseJsonFromModelText(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("Model returned an empty response.");
  }

  const fenced = extractFencedJson(trimmed);
  if (fenced) {
    const parsed = tryParseJson(fenced);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  const direct = tryParseJson(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  const objectCandidate = extractDelimitedJson(trimmed, "{", "}");
  if (objectCandidate) {
    const parsed = tryParseJson(objectCandidate);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  throw new Error("Model response did not contain valid JSON.");
}

type JsonParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParseJson(text: string): JsonParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function extractFencedJson(text: string): string | null {
  const match = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return match?.[1]?.trim() || null;
}

function extractDelimitedJson(text: string, start: string, end: string): string | null {
  const startIndex = text.indexOf(start);
  const endIndex = text.lastIndexOf(end);

  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    return null;
  }

  return text.slice(startIndex, endIndex + 1).trim();
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function asObject(value: unknown): Record<string, unknown> {
  if (!isJsonObject(value)) {
    throw new Error("Expected a JSON object.");
  }
  return value;
}

export function asObjectArray(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter(isJsonObject);
}
