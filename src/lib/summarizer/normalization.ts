/**
 * Output Normalizer
 *
 * Pure post-processing of a reduce or single-shot result into the canonical
 * SummaryDocument. The input Results title list is authoritative for the
 * shape and order of `results`; the model's echo never is.
 *
 * @module summarizer/normalization
 */

import type { HeaderDefaults } from "../summary-config";
import {
  decodeAbbreviationEntries,
  decodeFigures,
  decodeHeader,
  decodeKeyPoints,
  decodeResultEntries,
  RawSummarySchema,
} from "./decoders";
import { normalizeLanguageCode } from "./language";
import {
  MISSING_SECTION_PLACEHOLDER,
  SUMMARY_HEADER_KEYS,
  type Abbreviation,
  type ArticleDocument,
  type MiniSummary,
  type SummaryDocument,
  type SummaryHeader,
} from "./types";

export interface NormalizationContext {
  /** Input Results titles, in order */
  resultTitles: string[];
  article: Pick<ArticleDocument, "title" | "year">;
  headerDefaults?: HeaderDefaults;
  model: string;
  language: string;
  sourcePath?: string;
  /** Map-stage outputs used where the reduce output left a gap */
  fallbacks?: {
    miniSummaries?: MiniSummary[];
    figuresNarrative?: string;
  };
}

// ============================================================================
// HEADER
// ============================================================================

export function normalizeHeader(raw: unknown, ctx: NormalizationContext): SummaryHeader {
  const fromModel = decodeHeader(raw);
  const defaults = ctx.headerDefaults ?? {};
  const fromDocument: Partial<SummaryHeader> = {
    title: (ctx.article.title ?? "").trim(),
    year: String(ctx.article.year ?? "").trim(),
  };
  const fromRun: Partial<SummaryHeader> = {
    model: ctx.model,
    language: normalizeLanguageCode(ctx.language),
    source_path: ctx.sourcePath ?? "",
  };

  const header: SummaryHeader = { title: "", year: "", source_path: "", model: "", language: "" };
  for (const key of SUMMARY_HEADER_KEYS) {
    const candidates = [fromModel[key], defaults[key], fromDocument[key], fromRun[key]];
    header[key] = candidates.map((v) => (v ?? "").trim()).find((v) => v.length > 0) ?? "";
  }
  return header;
}

// ============================================================================
// RESULTS
// ============================================================================

function titleKey(title: string): string {
  return title.trim().replace(/\s+/g, " ").toLowerCase();
}

function isBlankSummary(text: string): boolean {
  const t = text.trim();
  return t === "" || t === MISSING_SECTION_PLACEHOLDER || t === "-" || t === "–";
}

/**
 * Rebuild `results` from the input titles. Per title: the entry at the same
 * position when the model returned a list of exactly one entry per title,
 * then an exact title match, then a whitespace/case-insensitive match, then
 * the Map-stage fallback (same position first, then by title), then "—".
 * Positional matches still require the title to agree, so repeated titles
 * keep their own summaries.
 */
export function normalizeResults(
  raw: unknown,
  resultTitles: readonly string[],
  fallbacks: readonly MiniSummary[] = [],
): MiniSummary[] {
  const entries = decodeResultEntries(raw);
  const positional = Array.isArray(raw) && entries.length === resultTitles.length ? entries : [];

  const exact = new Map<string, string>();
  const loose = new Map<string, string>();
  for (const entry of entries) {
    if (isBlankSummary(entry.text)) continue;
    if (!exact.has(entry.title)) exact.set(entry.title, entry.text);
    const key = titleKey(entry.title);
    if (!loose.has(key)) loose.set(key, entry.text);
  }

  const fallbackByTitle = new Map<string, string>();
  for (const item of fallbacks) {
    if (!isBlankSummary(item.mini_summary) && !fallbackByTitle.has(item.section_title)) {
      fallbackByTitle.set(item.section_title, item.mini_summary);
    }
  }

  const atPosition = (index: number, title: string): string | undefined => {
    const entry = positional[index];
    if (!entry || isBlankSummary(entry.text) || titleKey(entry.title) !== titleKey(title)) return undefined;
    return entry.text;
  };

  const fallbackAt = (index: number, title: string): string | undefined => {
    const item = fallbacks.length === resultTitles.length ? fallbacks[index] : undefined;
    if (!item || isBlankSummary(item.mini_summary) || item.section_title !== title) return undefined;
    return item.mini_summary;
  };

  return resultTitles.map((title, index) => ({
    section_title: title,
    mini_summary:
      atPosition(index, title) ??
      exact.get(title) ??
      loose.get(titleKey(title)) ??
      fallbackAt(index, title) ??
      fallbackByTitle.get(title) ??
      MISSING_SECTION_PLACEHOLDER,
  }));
}

// ============================================================================
// ABBREVIATIONS
// ============================================================================

/**
 * Deduplicate case-insensitively (first spelling kept, first non-empty
 * expansion wins), drop entries without an expansion, sort by abbreviation.
 */
export function normalizeAbbreviations(raw: unknown): Abbreviation[] {
  const byKey = new Map<string, Abbreviation>();
  for (const entry of decodeAbbreviationEntries(raw)) {
    const abbr = entry.abbr.trim();
    if (!abbr) continue;
    const key = abbr.toLowerCase();
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, { abbr, expanded: entry.expanded.trim() });
    } else if (!existing.expanded && entry.expanded.trim()) {
      existing.expanded = entry.expanded.trim();
    }
  }

  return [...byKey.entries()]
    .filter(([, entry]) => entry.expanded.length > 0)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, entry]) => entry);
}

// ============================================================================
// DOCUMENT
// ============================================================================

/**
 * Canonical SummaryDocument from a raw model object. Never calls the model
 * and never throws on malformed output.
 */
export function normalizeSummary(raw: unknown, ctx: NormalizationContext): SummaryDocument {
  const summary = RawSummarySchema.parse(raw);
  const figures = decodeFigures(summary.figures);

  return {
    header: normalizeHeader(summary.header, ctx),
    key_points: decodeKeyPoints(summary.key_points),
    introduction: summary.introduction,
    results: normalizeResults(summary.results, ctx.resultTitles, ctx.fallbacks?.miniSummaries),
    discussion: summary.discussion,
    figures: {
      narrative: figures.narrative || (ctx.fallbacks?.figuresNarrative ?? "").trim(),
      items: figures.items,
    },
    abbreviations: normalizeAbbreviations(summary.abbreviations),
  };
}
