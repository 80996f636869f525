/**
 * Article Summarizer - Orchestration
 *
 * generateSummary() runs one generation: precondition check, strategy
 * selection, single-shot or map-reduce, normalization, post-fill. Each run
 * owns its call budget and usage ledger.
 *
 * @module summarizer/summarize
 */

import type { SummaryConfig } from "../summary-config";
import { getResultSections, assertHasResults } from "./article";
import { createCallBudget } from "./budgets";
import type { StageContext } from "./context";
import { debugLog } from "./debug";
import { generateFigureNarrative } from "./figure-narrative";
import { languageLabel } from "./language";
import type { TextGenerationTransport } from "./llm";
import { normalizeSummary, type NormalizationContext } from "./normalization";
import { postFillSummary } from "./post-fill";
import { loadSummaryPrompts, type SummaryPrompts } from "./prompt-loader";
import { generateSingleShot, reduceSummary } from "./reduce";
import { createSchemaInvoker } from "./schema-invocation";
import { assertTitlesMatch, summarizeResultSections } from "./section-summaries";
import { measureArticleChars, selectStrategy } from "./strategy";
import type {
  ArticleDocument,
  GenerationStrategy,
  SummaryDocument,
  SummaryEventFn,
  UsageTotals,
} from "./types";
import { createUsageLedger, getUsageTotals } from "./usage-ledger";

export interface GenerateSummaryOptions<R> {
  config: SummaryConfig;
  transport: TextGenerationTransport<R>;
  /** Written to header.source_path when neither the model nor the defaults give one */
  sourcePath?: string;
  onEvent?: SummaryEventFn;
  /** Preloaded prompt templates; loaded from the prompt directory when absent */
  prompts?: SummaryPrompts;
}

export interface GenerateSummaryResult {
  summary: SummaryDocument;
  strategy: GenerationStrategy;
  usage: UsageTotals;
  budget: { attempts: number; ceiling: number };
}

/**
 * Generate a structured summary for one article.
 *
 * @throws MissingResultsError before any call when the article has no titled Results subsection
 * @throws CallBudgetExceededError when the run would exceed `config.maxCalls`
 */
export async function generateSummary<R>(
  article: ArticleDocument,
  options: GenerateSummaryOptions<R>,
): Promise<GenerateSummaryResult> {
  const { config, transport } = options;
  const emit = (message: string, progress: number) => options.onEvent?.(message, progress);

  const sections = getResultSections(article);
  assertHasResults(sections);
  const resultTitles = sections.map((s) => s.title);

  const prompts = options.prompts ?? (await loadSummaryPrompts());
  const budget = createCallBudget(config.maxCalls);
  const ledger = createUsageLedger();
  const ctx: StageContext = {
    invoker: createSchemaInvoker({ transport, budget, ledger }),
    prompts,
    config,
    languageLabel: languageLabel(config.language),
  };

  const decision = selectStrategy({
    setting: config.strategy,
    jsonReliable: config.jsonReliable,
    inputChars: measureArticleChars(article),
    autoThresholdChars: config.autoThresholdChars,
  });

  debugLog("[Summary] Run start", {
    strategy: decision.strategy,
    reason: decision.reason,
    results: resultTitles.length,
    figures: article.figures?.length ?? 0,
    maxCalls: budget.ceiling,
    model: transport.modelId,
    prompts: prompts.version,
  });
  emit(`Strategy: ${decision.strategy}`, 0);

  const normalization: NormalizationContext = {
    resultTitles,
    article,
    headerDefaults: config.headerDefaults,
    model: transport.modelId,
    language: config.language,
    sourcePath: options.sourcePath,
  };

  let summary: SummaryDocument;
  try {
    if (decision.strategy === "single_shot") {
      emit("Generating summary (single request)", 10);
      const raw = await generateSingleShot(ctx, article, resultTitles);
      summary = normalizeSummary(raw, normalization);
    } else {
      emit("Summarizing Results subsections", 5);
      const miniSummaries = await summarizeResultSections(ctx, sections, (done, total) =>
        emit(`Summarized Results subsection ${done}/${total}`, 5 + Math.round((done / total) * 55)),
      );
      assertTitlesMatch(resultTitles, miniSummaries);

      emit("Writing figure narrative", 62);
      const figures = await generateFigureNarrative(ctx, article.figures ?? [], miniSummaries);

      emit("Combining summary", 75);
      const raw = await reduceSummary(ctx, {
        article,
        resultTitles,
        miniSummaries,
        figuresNarrative: figures.narrative,
      });
      summary = normalizeSummary(raw, {
        ...normalization,
        fallbacks: { miniSummaries, figuresNarrative: figures.narrative },
      });
    }

    emit("Filling missing sections", 88);
    summary = await postFillSummary(ctx, summary, article);
  } catch (err) {
    debugLog("[Summary] Run aborted", {
      error: err instanceof Error ? `${err.name}: ${err.message}` : String(err),
      attempts: budget.attempts,
      ceiling: budget.ceiling,
      exceedReason: budget.exceedReason,
    });
    throw err;
  }

  const usage = getUsageTotals(ledger);
  debugLog("[Summary] Run complete", {
    strategy: decision.strategy,
    attempts: budget.attempts,
    ceiling: budget.ceiling,
    usage: { input: usage.inputTokens, output: usage.outputTokens, total: usage.totalTokens },
  });
  emit("Done", 100);

  return {
    summary,
    strategy: decision.strategy,
    usage,
    budget: { attempts: budget.attempts, ceiling: budget.ceiling },
  };
}
