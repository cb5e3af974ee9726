import { MalformedOutput } from "../errors";

export type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseJsonObject = (candidate: string): JsonObject | null => {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

/**
 * Outermost `{ ... }` span of the text, or null when there is none.
 * Two unrelated objects in one text produce a single span covering both.
 */
export const findBracedSpan = (text: string): string | null => {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || start >= end) {
    return null;
  }
  return text.slice(start, end + 1);
};

/**
 * Recovers a JSON object from model output. The whole text is parsed first;
 * when that fails, the span between the first `{` and the last `}` is tried.
 */
export const extractJson = (rawText: string): JsonObject => {
  const strict = parseJsonObject(rawText);
  if (strict) {
    return strict;
  }

  const span = findBracedSpan(rawText);
  const recovered = span === null ? null : parseJsonObject(span);
  if (recovered) {
    return recovered;
  }

  throw new MalformedOutput("No JSON object found in model output.", rawText);
};

export const prettyJson = (value: unknown): string => JSON.stringify(value, null, 2);
