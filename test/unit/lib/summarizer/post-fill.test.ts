/**
 * Post-fill tests
 *
 * @module summarizer/post-fill.test
 */

import { describe, expect, it } from "vitest";

import {
  chunkTargets,
  isEmptySectionText,
  postFillSummary,
  regenerateSection,
  targetWordCount,
} from "@/lib/summarizer/post-fill";
import type { SummaryDocument } from "@/lib/summarizer/types";
import { createTestStage, makeArticle, payloadOf } from "@test/helpers/test-helpers";

// 60 words, 299 chars: two of them overflow a 500-char chunk.
const PARAGRAPH = "word ".repeat(60).trim();
const TWO_PARAGRAPHS = `${PARAGRAPH}\n\n${PARAGRAPH}`;

function summaryDoc(overrides: Partial<SummaryDocument> = {}): SummaryDocument {
  return {
    header: { title: "T", year: "2024", source_path: "", model: "test-model", language: "EN" },
    key_points: ["Existing point."],
    introduction: "Existing intro.",
    results: [{ section_title: "Effects of X", mini_summary: "X summary." }],
    discussion: "Existing discussion.",
    figures: { narrative: "", items: [] },
    abbreviations: [],
    ...overrides,
  };
}

describe("sizing", () => {
  it("treats blank text and the placeholder as empty", () => {
    expect(isEmptySectionText(" ")).toBe(true);
    expect(isEmptySectionText("—")).toBe(true);
    expect(isEmptySectionText("Text.")).toBe(false);
  });

  it("targets a fraction of the source with a floor", () => {
    expect(targetWordCount(1000, 0.2, 60)).toBe(200);
    expect(targetWordCount(100, 0.2, 60)).toBe(60);
  });

  it("splits the target proportionally with a per-chunk floor", () => {
    expect(chunkTargets(["one two three", "four"], 400)).toEqual([300, 100]);
    expect(chunkTargets(["one two three", "four"], 8)).toEqual([30, 30]);
  });
});

describe("regenerateSection", () => {
  it("makes no call for an empty source", async () => {
    const { ctx, transport } = await createTestStage([]);

    expect(await regenerateSection(ctx, "introduction", "  ")).toBe("");
    expect(transport.requests).toHaveLength(0);
  });

  it("uses one call and the overall target for a single chunk", async () => {
    const { ctx, transport } = await createTestStage([{ summary: "Regenerated intro." }]);

    const text = await regenerateSection(ctx, "introduction", "Background on the model organism.");

    expect(text).toBe("Regenerated intro.");
    expect(transport.labels()).toEqual(["postfill:introduction:chunk1"]);
    expect(transport.requests[0].prompt).toContain("Target length: about 60 words.");
    expect(payloadOf(transport.requests[0])).toEqual({
      section: "introduction",
      text: "Background on the model organism.",
    });
  });

  it("maps each chunk and merges the partials", async () => {
    const { ctx, transport } = await createTestStage(
      [{ summary: "Part one." }, { summary: "Part two." }, { summary: "Merged discussion." }],
      { postFillChunkChars: 500 },
    );

    const text = await regenerateSection(ctx, "discussion", TWO_PARAGRAPHS);

    expect(text).toBe("Merged discussion.");
    expect(transport.labels()).toEqual([
      "postfill:discussion:chunk1",
      "postfill:discussion:chunk2",
      "postfill:discussion:merge",
    ]);
    expect(transport.requests[0].prompt).toContain("Summarize part 1 of 2 of the discussion section");
    expect(transport.requests[0].prompt).toContain("Target length: about 30 words.");
    expect(transport.requests[2].prompt).toContain("Target length: about 60 words.");
    expect(payloadOf(transport.requests[2])).toEqual({
      section: "discussion",
      partial_summaries: ["Part one.", "Part two."],
    });
  });

  it("falls back to the joined partials when the merge comes back empty", async () => {
    const { ctx } = await createTestStage([{ summary: "Part one." }, { summary: "Part two." }, { summary: "" }], {
      postFillChunkChars: 500,
    });

    expect(await regenerateSection(ctx, "discussion", TWO_PARAGRAPHS)).toBe("Part one.\n\nPart two.");
  });
});

describe("postFillSummary", () => {
  it("leaves a complete document alone", async () => {
    const { ctx, transport } = await createTestStage([]);
    const summary = summaryDoc();

    expect(await postFillSummary(ctx, summary, makeArticle())).toEqual(summary);
    expect(transport.requests).toHaveLength(0);
  });

  it("regenerates an empty introduction and missing key points without touching the input", async () => {
    const { ctx, transport } = await createTestStage([
      { summary: "Regenerated intro." },
      { key_points: ["- New point"] },
    ]);
    const summary = summaryDoc({ introduction: "—", key_points: [] });

    const filled = await postFillSummary(ctx, summary, makeArticle());

    expect(transport.labels()).toEqual(["postfill:introduction:chunk1", "postfill:key_points"]);
    expect(filled.introduction).toBe("Regenerated intro.");
    expect(filled.key_points).toEqual(["New point"]);
    expect(payloadOf(transport.requests[1]).introduction).toBe("Regenerated intro.");
    expect(summary.introduction).toBe("—");
  });

  it("skips a section whose source is empty", async () => {
    const { ctx, transport } = await createTestStage([]);

    const filled = await postFillSummary(ctx, summaryDoc({ discussion: "" }), makeArticle({ discussion: "" }));

    expect(filled.discussion).toBe("");
    expect(transport.requests).toHaveLength(0);
  });
});
