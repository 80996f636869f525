/**
 * JSON extraction utilities for recovering structured outputs from LLM text.
 *
 * These helpers are intentionally conservative: strip a code fence, parse,
 * and as a last resort locate the first balanced JSON object.
 */

import type { JsonObject } from "./types";

/**
 * Remove a ```json ... ``` (or bare ```) wrapper around the whole response.
 */
export function stripJsonFence(text: string): string {
  let t = String(text ?? "").trim();
  if (t.startsWith("```")) {
    t = t.replace(/^```[a-zA-Z]*\s*/, "");
    t = t.replace(/\s*```$/, "");
  }
  return t.trim();
}

/**
 * Extract the first JSON object substring from arbitrary text.
 * Resilient to braces inside quoted strings.
 */
export function extractFirstJsonObjectFromText(text: string): string | null {
  const raw = String(text ?? "");
  const start = raw.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escape) {
        escape = false;
        continue;
      }
      if (ch === "\\") {
        escape = true;
        continue;
      }
      if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
      continue;
    }

    if (ch === "{") depth++;
    if (ch === "}") depth--;

    if (depth === 0) return raw.slice(start, i + 1);
  }

  return null;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse a model response that should contain exactly one JSON object.
 * Returns null when no object can be recovered.
 */
export function parseJsonObjectResponse(text: string): JsonObject | null {
  const stripped = stripJsonFence(text);
  if (!stripped) return null;

  const direct = tryParse(stripped);
  if (isJsonObject(direct)) return direct;

  const candidate = extractFirstJsonObjectFromText(stripped);
  if (!candidate) return null;
  const recovered = tryParse(candidate);
  return isJsonObject(recovered) ? recovered : null;
}
