/**
 * Reduce Stage and single-shot generation.
 *
 * Both return the raw model object; neither result is final until it has
 * been through the Output Normalizer.
 *
 * @module summarizer/reduce
 */

import { SUMMARY_CONTRACT } from "./contracts";
import type { StageContext } from "./context";
import type { RawSummary } from "./decoders";
import type { ArticleDocument, MiniSummary } from "./types";

/** Leading `maxChars` of `text`, cut back to the last whitespace when possible. */
export function textExcerpt(text: string, maxChars: number): string {
  const t = (text ?? "").trim();
  if (t.length <= maxChars) return t;
  const cut = t.slice(0, maxChars);
  const lastSpace = cut.search(/\s\S*$/);
  return (lastSpace > maxChars / 2 ? cut.slice(0, lastSpace) : cut).trimEnd() + " …";
}

export interface ReduceInput {
  article: ArticleDocument;
  resultTitles: string[];
  miniSummaries: MiniSummary[];
  figuresNarrative: string;
}

export function buildReducePayload(input: ReduceInput, excerptChars: number) {
  const { article } = input;
  return {
    article: {
      title: article.title,
      year: article.year,
      introduction_excerpt: textExcerpt(article.introduction, excerptChars),
      discussion_excerpt: textExcerpt(article.discussion, excerptChars),
    },
    results_titles: input.resultTitles,
    results_mini: input.miniSummaries,
    figures_narrative: input.figuresNarrative,
  };
}

export async function reduceSummary(ctx: StageContext, input: ReduceInput): Promise<RawSummary> {
  return ctx.invoker.invoke({
    label: "reduce",
    prompt: ctx.prompts.render("REDUCE_SUMMARY", {
      LANGUAGE: ctx.languageLabel,
      RESULTS_COUNT: String(input.resultTitles.length),
    }),
    payload: buildReducePayload(input, ctx.config.reduceExcerptChars),
    contract: SUMMARY_CONTRACT,
  });
}

/**
 * One request over the whole article.
 */
export async function generateSingleShot(
  ctx: StageContext,
  article: ArticleDocument,
  resultTitles: string[],
): Promise<RawSummary> {
  return ctx.invoker.invoke({
    label: "single_shot",
    prompt: ctx.prompts.render("SINGLE_SHOT_SUMMARY", {
      LANGUAGE: ctx.languageLabel,
      RESULTS_COUNT: String(resultTitles.length),
    }),
    payload: article,
    contract: SUMMARY_CONTRACT,
  });
}
