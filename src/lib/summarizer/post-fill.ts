/**
 * Post-fill: regenerate an empty introduction or discussion from the source
 * section (chunk map, then merge) and generate key points when none came back.
 *
 * Runs after either strategy, on the normalized document.
 *
 * @module summarizer/post-fill
 */

import { KEY_POINTS_CONTRACT, SECTION_TEXT_CONTRACT } from "./contracts";
import type { StageContext } from "./context";
import { debugLog } from "./debug";
import { countWords, packChunks } from "./text-chunks";
import { MISSING_SECTION_PLACEHOLDER, type ArticleDocument, type SummaryDocument } from "./types";

export type PostFillSection = "introduction" | "discussion";

const MIN_CHUNK_TARGET_WORDS = 30;

export function isEmptySectionText(text: string): boolean {
  const t = (text ?? "").trim();
  return t === "" || t === MISSING_SECTION_PLACEHOLDER;
}

/** Target summary length: a fixed fraction of the source, never below the floor. */
export function targetWordCount(sourceWords: number, ratio: number, minWords: number): number {
  return Math.max(minWords, Math.round(sourceWords * ratio));
}

/**
 * Per-chunk targets proportional to each chunk's share of the source words.
 */
export function chunkTargets(chunks: readonly string[], totalTarget: number): number[] {
  const words = chunks.map(countWords);
  const total = words.reduce((sum, n) => sum + n, 0);
  return words.map((n) =>
    Math.max(MIN_CHUNK_TARGET_WORDS, total > 0 ? Math.round((totalTarget * n) / total) : MIN_CHUNK_TARGET_WORDS),
  );
}

/**
 * Summarize one source section with one call per chunk and, for more than
 * one chunk, a single merge call. Returns "" for an empty source.
 */
export async function regenerateSection(
  ctx: StageContext,
  section: PostFillSection,
  sourceText: string,
): Promise<string> {
  const { postFillTargetRatio, postFillMinWords, postFillChunkChars } = ctx.config;
  const sourceWords = countWords(sourceText);
  if (sourceWords === 0) return "";

  const target = targetWordCount(sourceWords, postFillTargetRatio, postFillMinWords);
  const chunks = packChunks(sourceText, postFillChunkChars);
  const targets = chunkTargets(chunks, target);
  debugLog(`[Summary] Post-fill ${section}`, { sourceWords, target, chunks: chunks.length });

  const partials: string[] = [];
  for (let i = 0; i < chunks.length; i++) {
    const output = await ctx.invoker.invoke({
      label: `postfill:${section}:chunk${i + 1}`,
      prompt: ctx.prompts.render("SECTION_CHUNK_SUMMARY", {
        LANGUAGE: ctx.languageLabel,
        SECTION_NAME: section,
        CHUNK_INDEX: String(i + 1),
        CHUNK_COUNT: String(chunks.length),
        TARGET_WORDS: String(chunks.length === 1 ? target : targets[i]),
      }),
      payload: { section, text: chunks[i] },
      contract: SECTION_TEXT_CONTRACT,
    });
    partials.push(output.summary);
  }

  if (partials.length === 1) return partials[0];

  const merged = await ctx.invoker.invoke({
    label: `postfill:${section}:merge`,
    prompt: ctx.prompts.render("SECTION_MERGE", {
      LANGUAGE: ctx.languageLabel,
      SECTION_NAME: section,
      TARGET_WORDS: String(target),
    }),
    payload: { section, partial_summaries: partials },
    contract: SECTION_TEXT_CONTRACT,
  });
  return merged.summary || partials.filter(Boolean).join("\n\n");
}

export async function generateKeyPoints(ctx: StageContext, summary: SummaryDocument): Promise<string[]> {
  const output = await ctx.invoker.invoke({
    label: "postfill:key_points",
    prompt: ctx.prompts.render("KEY_POINTS", { LANGUAGE: ctx.languageLabel }),
    payload: {
      introduction: summary.introduction,
      results: summary.results,
      discussion: summary.discussion,
    },
    contract: KEY_POINTS_CONTRACT,
  });
  return output.key_points;
}

/**
 * Fill the gaps of a normalized document. Returns a new document; the input
 * is not modified.
 */
export async function postFillSummary(
  ctx: StageContext,
  summary: SummaryDocument,
  article: ArticleDocument,
): Promise<SummaryDocument> {
  const filled: SummaryDocument = { ...summary };

  if (isEmptySectionText(filled.introduction) && countWords(article.introduction) > 0) {
    filled.introduction = await regenerateSection(ctx, "introduction", article.introduction);
  }
  if (isEmptySectionText(filled.discussion) && countWords(article.discussion) > 0) {
    filled.discussion = await regenerateSection(ctx, "discussion", article.discussion);
  }
  if (filled.key_points.length === 0) {
    filled.key_points = await generateKeyPoints(ctx, filled);
  }
  return filled;
}
