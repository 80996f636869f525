/**
 * Article Summarizer - Type Definitions
 *
 * Input document shapes produced by the extraction step, the persisted
 * SummaryDocument contract consumed by the renderer, and the run-scoped
 * records passed between pipeline stages.
 *
 * The SummaryDocument keeps snake_case keys: it is written to disk as JSON
 * and read back by the document writer, so its field names are the wire format.
 *
 * @module summarizer/types
 */

// ============================================================================
// INPUT DOCUMENT
// ============================================================================

export interface ResultSection {
  title: string;
  text: string;
}

export interface Figure {
  number: number | string;
  caption: string;
}

/**
 * Structurally parsed article. Read-only for the whole run.
 */
export interface ArticleDocument {
  title: string;
  year: string | number;
  introduction: string;
  methods: string;
  results: ResultSection[];
  discussion: string;
  figures: Figure[];
}

// ============================================================================
// MAP STAGE RECORDS
// ============================================================================

/** One Results subsection summary; `section_title` always equals the input title. */
export interface MiniSummary {
  section_title: string;
  mini_summary: string;
}

export interface FigureNarrativeChunk {
  chunk_id: number;
  narrative: string;
}

// ============================================================================
// OUTPUT DOCUMENT
// ============================================================================

export interface SummaryHeader {
  title: string;
  year: string;
  source_path: string;
  model: string;
  language: string;
}

export const SUMMARY_HEADER_KEYS = ["title", "year", "source_path", "model", "language"] as const;

export type SummaryHeaderKey = (typeof SUMMARY_HEADER_KEYS)[number];

export interface FigureSummaryItem {
  figure: string;
  summary: string;
}

export interface SummaryFigures {
  narrative: string;
  items: FigureSummaryItem[];
}

export interface Abbreviation {
  abbr: string;
  expanded: string;
}

/**
 * Final structured summary handed to the rendering collaborator.
 * `results` always has the same length and order as the input Results list.
 */
export interface SummaryDocument {
  header: SummaryHeader;
  key_points: string[];
  introduction: string;
  results: MiniSummary[];
  discussion: string;
  figures: SummaryFigures;
  abbreviations: Abbreviation[];
}

/** Placeholder for a Results entry the model did not produce. */
export const MISSING_SECTION_PLACEHOLDER = "—";

// ============================================================================
// STRATEGY / RUN
// ============================================================================

export type GenerationStrategy = "single_shot" | "hierarchical";

export type StrategySetting = "auto" | GenerationStrategy;

/** Progress callback for hosts that run a generation on a background worker. */
export type SummaryEventFn = (message: string, progress: number) => void;

// ============================================================================
// USAGE
// ============================================================================

export interface UsageRecord {
  label: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  /** Provider usage payload as returned, kept for debugging */
  raw?: unknown;
}

export interface UsageTotals {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  calls: UsageRecord[];
}

/** A JSON object returned by the model, before tolerant decoding. */
export type JsonObject = Record<string, unknown>;
