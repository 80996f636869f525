/**
 * Map Stage: Figure narrative batcher.
 *
 * Figures are cut into fixed-size batches in input order. Each batch is
 * sent with only the mini-summaries that cite one of its figures, and the
 * returned narratives are joined in batch order.
 *
 * @module summarizer/figure-narrative
 */

import { FIGURE_NARRATIVE_CONTRACT } from "./contracts";
import type { StageContext } from "./context";
import { debugLog } from "./debug";
import type { FigureNarrativeOutput } from "./decoders";
import { isRecoverableCallError } from "./errors";
import { requiredRefKeys } from "./figure-references";
import type { Figure, FigureNarrativeChunk, MiniSummary } from "./types";

export interface FigureBatch {
  chunkId: number;
  /** Non-empty captions of the batch, in input order */
  captions: string[];
  /** Normalized non-supplementary references cited by the captions */
  refKeys: Set<string>;
  /** Mini-summaries sharing at least one reference with the captions */
  relevant: MiniSummary[];
}

export interface FigureNarrativeResult {
  narrative: string;
  chunks: FigureNarrativeChunk[];
}

/**
 * Partition figures into batches and select each batch's relevant
 * mini-summaries. Pure.
 */
export function planFigureBatches(
  figures: readonly Figure[],
  miniSummaries: readonly MiniSummary[],
  batchSize: number,
): FigureBatch[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Figure batch size must be a positive integer, got ${batchSize}`);
  }

  const summaryRefs = miniSummaries.map((item) => ({ item, refs: requiredRefKeys(item.mini_summary) }));
  const batches: FigureBatch[] = [];

  for (let start = 0; start < figures.length; start += batchSize) {
    const captions = figures
      .slice(start, start + batchSize)
      .map((figure) => (figure.caption ?? "").trim())
      .filter((caption) => caption.length > 0);

    const refKeys = new Set<string>();
    for (const caption of captions) {
      for (const key of requiredRefKeys(caption)) refKeys.add(key);
    }

    const relevant =
      refKeys.size === 0
        ? []
        : summaryRefs.filter(({ refs }) => [...refs].some((key) => refKeys.has(key))).map(({ item }) => item);

    batches.push({ chunkId: start / batchSize + 1, captions, refKeys, relevant });
  }
  return batches;
}

async function invokeBatch(ctx: StageContext, batch: FigureBatch): Promise<FigureNarrativeOutput> {
  const label = `figures:${batch.chunkId}`;
  const request = {
    prompt: ctx.prompts.render("FIGURE_NARRATIVE", { LANGUAGE: ctx.languageLabel }),
    payload: {
      chunk_id: batch.chunkId,
      captions: batch.captions,
      relevant_results_mini: batch.relevant,
    },
    contract: FIGURE_NARRATIVE_CONTRACT,
  };

  try {
    return await ctx.invoker.invoke({ label, ...request });
  } catch (err) {
    if (!isRecoverableCallError(err)) throw err;
    debugLog(`[Summary] Retrying "${label}" once`, { reason: String(err) });
    return ctx.invoker.invoke({ label: `${label}:retry`, ...request });
  }
}

/**
 * Generate the batched figure narrative. Zero figures means zero calls and
 * an empty narrative; a batch without captions is skipped.
 */
export async function generateFigureNarrative(
  ctx: StageContext,
  figures: readonly Figure[],
  miniSummaries: readonly MiniSummary[],
): Promise<FigureNarrativeResult> {
  const chunks: FigureNarrativeChunk[] = [];

  for (const batch of planFigureBatches(figures, miniSummaries, ctx.config.figuresBatchSize)) {
    if (batch.captions.length === 0) {
      debugLog(`[Summary] Skipping figure batch ${batch.chunkId}: no captions`);
      continue;
    }
    const output = await invokeBatch(ctx, batch);
    chunks.push({ chunk_id: batch.chunkId, narrative: output.narrative });
  }

  const narrative = chunks
    .map((chunk) => chunk.narrative.trim())
    .filter((text) => text.length > 0)
    .join("\n\n");
  return { narrative, chunks };
}
