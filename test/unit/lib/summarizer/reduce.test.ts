import { describe, expect, it } from "vitest";

import { buildReducePayload, generateSingleShot, reduceSummary, textExcerpt } from "@/lib/summarizer/reduce";
import { createTestStage, fullSummaryReply, makeArticle, payloadOf } from "@test/helpers/test-helpers";

describe("textExcerpt", () => {
  it("returns short text trimmed and unchanged", () => {
    expect(textExcerpt("  short text  ", 100)).toBe("short text");
  });

  it("cuts back to the last whitespace", () => {
    expect(textExcerpt("alpha beta gamma delta", 12)).toBe("alpha beta …");
  });

  it("cuts hard when the last whitespace is too early", () => {
    expect(textExcerpt("a bcdefghijk", 8)).toBe("a bcdefg …");
    expect(textExcerpt("abcdefghij", 4)).toBe("abcd …");
  });
});

describe("buildReducePayload", () => {
  it("sends excerpts, titles, mini-summaries and the figure narrative", () => {
    const article = makeArticle({ introduction: "alpha beta gamma delta", discussion: "Short." });
    const miniSummaries = [{ section_title: "Effects of X", mini_summary: "X mattered (Figure 1)." }];

    expect(
      buildReducePayload(
        { article, resultTitles: ["Effects of X"], miniSummaries, figuresNarrative: "Figure 1 shows X." },
        12,
      ),
    ).toEqual({
      article: {
        title: "Test Article",
        year: 2024,
        introduction_excerpt: "alpha beta …",
        discussion_excerpt: "Short.",
      },
      results_titles: ["Effects of X"],
      results_mini: miniSummaries,
      figures_narrative: "Figure 1 shows X.",
    });
  });
});

describe("reduceSummary", () => {
  it("makes one call labelled reduce with the results count in the prompt", async () => {
    const titles = ["Effects of X", "Role of Y"];
    const { ctx, transport } = await createTestStage([fullSummaryReply(titles)]);

    const raw = await reduceSummary(ctx, {
      article: makeArticle(),
      resultTitles: titles,
      miniSummaries: [],
      figuresNarrative: "",
    });

    expect(transport.labels()).toEqual(["reduce"]);
    expect(transport.requests[0].prompt).toContain("Results subsection titles (2 titles)");
    expect(raw.introduction).toBe("Intro summary.");
    expect(raw.discussion).toBe("Discussion summary.");
  });
});

describe("generateSingleShot", () => {
  it("sends the whole article as the payload", async () => {
    const article = makeArticle();
    const { ctx, transport } = await createTestStage([fullSummaryReply(["Effects of X", "Role of Y"])]);

    await generateSingleShot(ctx, article, ["Effects of X", "Role of Y"]);

    expect(transport.labels()).toEqual(["single_shot"]);
    expect(payloadOf(transport.requests[0])).toEqual(JSON.parse(JSON.stringify(article)));
  });
});
