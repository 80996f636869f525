/**
 * Article Summarizer - public surface
 *
 * @module summarizer
 */

export { generateSummary } from "./summarize";
export type { GenerateSummaryOptions, GenerateSummaryResult } from "./summarize";
export { parseArticleDocument, getResultTitles } from "./article";
export { createAiSdkTransport, resolveModel, detectProviderFromModelName } from "./llm";
export type { TextGenerationTransport, TransportRequest, ModelInfo } from "./llm";
export { normalizeSummary } from "./normalization";
export { selectStrategy } from "./strategy";
export { extractRequiredFigureRefs, isSupplementaryRef } from "./figure-references";
export { loadSummaryPrompts } from "./prompt-loader";
export * from "./errors";
export type {
  ArticleDocument,
  ResultSection,
  Figure,
  MiniSummary,
  SummaryDocument,
  SummaryHeader,
  GenerationStrategy,
  SummaryEventFn,
  UsageRecord,
  UsageTotals,
} from "./types";
export { MISSING_SECTION_PLACEHOLDER, SUMMARY_HEADER_KEYS } from "./types";
