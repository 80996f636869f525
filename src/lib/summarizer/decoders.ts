/**
 * Tolerant decoders for model output.
 *
 * Each decoder accepts the shapes models are seen to return, in a fixed
 * priority order, and yields a canonical typed record. Missing or mistyped
 * fields degrade to empty values; nothing here throws on model output.
 *
 * @module summarizer/decoders
 */

import { z } from "zod";

import { isJsonObject } from "./json";
import {
  SUMMARY_HEADER_KEYS,
  type Abbreviation,
  type FigureSummaryItem,
  type JsonObject,
  type SummaryFigures,
  type SummaryHeader,
} from "./types";

// ============================================================================
// PRIMITIVES
// ============================================================================

/** Strings are trimmed, finite numbers stringified, anything else is "". */
export function asText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

/** First non-empty text among `keys`, in the given order. */
function pickText(obj: JsonObject, keys: readonly string[]): string {
  for (const key of keys) {
    const text = asText(obj[key]);
    if (text) return text;
  }
  return "";
}

const looseText = z.unknown().transform(asText);

const asObject = (value: unknown): JsonObject => (isJsonObject(value) ? value : {});

// ============================================================================
// CALL-SITE SCHEMAS
// ============================================================================

export const MiniSummaryOutputSchema = z.preprocess(
  asObject,
  z
    .object({
      section_title: looseText,
      mini_summary: looseText,
      summary: looseText,
      text: looseText,
    })
    .transform((o) => ({
      section_title: o.section_title,
      mini_summary: o.mini_summary || o.summary || o.text,
    })),
);

export type MiniSummaryOutput = z.infer<typeof MiniSummaryOutputSchema>;

export const FigureNarrativeOutputSchema = z.preprocess(
  asObject,
  z
    .object({
      chunk_id: z.unknown().transform((v) => (typeof v === "number" && Number.isInteger(v) ? v : null)),
      narrative: looseText,
      text: looseText,
    })
    .transform((o) => ({ chunk_id: o.chunk_id, narrative: o.narrative || o.text })),
);

export type FigureNarrativeOutput = z.infer<typeof FigureNarrativeOutputSchema>;

/**
 * Reduce / single-shot output before normalization. Structured fields stay
 * raw here; the normalizer owns their shape handling.
 */
export const RawSummarySchema = z.preprocess(
  asObject,
  z.object({
    header: z.unknown(),
    key_points: z.unknown(),
    introduction: looseText,
    results: z.unknown(),
    discussion: looseText,
    figures: z.unknown(),
    abbreviations: z.unknown(),
  }),
);

export type RawSummary = z.infer<typeof RawSummarySchema>;

export const SectionTextOutputSchema = z.preprocess(
  asObject,
  z
    .object({ summary: looseText, text: looseText })
    .transform((o) => ({ summary: o.summary || o.text })),
);

export type SectionTextOutput = z.infer<typeof SectionTextOutputSchema>;

export const KeyPointsOutputSchema = z.preprocess(
  asObject,
  z.object({ key_points: z.unknown() }).transform((o) => ({ key_points: decodeKeyPoints(o.key_points) })),
);

export type KeyPointsOutput = z.infer<typeof KeyPointsOutputSchema>;

// ============================================================================
// HEADER
// ============================================================================

export function decodeHeader(raw: unknown): Partial<SummaryHeader> {
  const obj = asObject(raw);
  const header: Partial<SummaryHeader> = {};
  for (const key of SUMMARY_HEADER_KEYS) {
    const value = asText(obj[key]);
    if (value) header[key] = value;
  }
  return header;
}

// ============================================================================
// KEY POINTS
// ============================================================================

const BULLET_PREFIX = /^\s*(?:[-*•·]|\d+[.)])\s*/;

/**
 * Accepted shapes, in order: list of strings (or `{text}` objects),
 * a single string with one point per line.
 */
export function decodeKeyPoints(raw: unknown): string[] {
  let items: string[] = [];
  if (Array.isArray(raw)) {
    items = raw.map((item) => (isJsonObject(item) ? pickText(item, ["text", "point", "key_point"]) : asText(item)));
  } else if (typeof raw === "string") {
    items = raw.split(/\r?\n/);
  }
  return items.map((item) => item.replace(BULLET_PREFIX, "").trim()).filter((item) => item.length > 0);
}

// ============================================================================
// RESULTS
// ============================================================================

const RESULT_TITLE_KEYS = ["section_title", "title", "section", "name"] as const;
const RESULT_TEXT_KEYS = ["mini_summary", "summary", "text", "content"] as const;

/**
 * Title → summary pairs from the model's `results`, in the order given.
 * Accepted shapes, in order: list of objects, map of title → string,
 * map of title → object.
 */
export function decodeResultEntries(raw: unknown): Array<{ title: string; text: string }> {
  const entries: Array<{ title: string; text: string }> = [];

  if (Array.isArray(raw)) {
    for (const item of raw) {
      if (!isJsonObject(item)) continue;
      const title = pickText(item, RESULT_TITLE_KEYS);
      if (title) entries.push({ title, text: pickText(item, RESULT_TEXT_KEYS) });
    }
    return entries;
  }

  if (isJsonObject(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      const title = key.trim();
      if (!title) continue;
      const text = isJsonObject(value) ? pickText(value, RESULT_TEXT_KEYS) : asText(value);
      entries.push({ title, text });
    }
  }
  return entries;
}

// ============================================================================
// FIGURES
// ============================================================================

const FIGURE_LABEL_KEYS = ["figure", "label", "number", "figure_number", "id"] as const;
const FIGURE_TEXT_KEYS = ["summary", "text", "description", "caption"] as const;

function decodeFigureItems(raw: unknown): FigureSummaryItem[] {
  const items: FigureSummaryItem[] = [];
  if (Array.isArray(raw)) {
    for (const item of raw) {
      if (!isJsonObject(item)) continue;
      items.push({ figure: pickText(item, FIGURE_LABEL_KEYS), summary: pickText(item, FIGURE_TEXT_KEYS) });
    }
  } else if (isJsonObject(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      items.push({ figure: key.trim(), summary: asText(value) });
    }
  }
  return items.filter((item) => item.figure && item.summary);
}

/**
 * Accepted shapes, in order: `{narrative, items}` object (alternate keys
 * allowed), plain string (narrative only), list (items only), map of
 * figure label → summary.
 */
export function decodeFigures(raw: unknown): SummaryFigures {
  if (typeof raw === "string") return { narrative: raw.trim(), items: [] };
  if (Array.isArray(raw)) return { narrative: "", items: decodeFigureItems(raw) };
  if (!isJsonObject(raw)) return { narrative: "", items: [] };

  const hasKnownKeys = ["narrative", "items", "figures", "text", "summary"].some((key) => key in raw);
  if (!hasKnownKeys) return { narrative: "", items: decodeFigureItems(raw) };

  return {
    narrative: pickText(raw, ["narrative", "text", "summary"]),
    items: decodeFigureItems(raw.items ?? raw.figures),
  };
}

// ============================================================================
// ABBREVIATIONS
// ============================================================================

const ABBR_KEYS = ["abbr", "abbreviation", "short", "term", "acronym"] as const;
const EXPANSION_KEYS = ["expanded", "expansion", "full", "definition", "meaning"] as const;

function splitAbbreviationLine(line: string): Abbreviation {
  const match = line.match(/^\s*([^:=—–]+?)\s*(?::|=|—|–|\s-\s)\s*(.+)$/);
  if (!match) return { abbr: line.trim(), expanded: "" };
  return { abbr: match[1].trim(), expanded: match[2].trim() };
}

/**
 * Abbreviation pairs in the order given, before deduplication.
 * Accepted shapes, in order: list of objects, list of "ABBR: expansion"
 * strings, map of abbreviation → expansion.
 */
export function decodeAbbreviationEntries(raw: unknown): Abbreviation[] {
  if (Array.isArray(raw)) {
    return raw.map((item) => {
      if (isJsonObject(item)) return { abbr: pickText(item, ABBR_KEYS), expanded: pickText(item, EXPANSION_KEYS) };
      return splitAbbreviationLine(asText(item));
    });
  }
  if (isJsonObject(raw)) {
    return Object.entries(raw).map(([abbr, expanded]) => ({ abbr: abbr.trim(), expanded: asText(expanded) }));
  }
  return [];
}
