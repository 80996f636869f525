import { describe, expect, it } from "vitest";

import { measureArticleChars, selectStrategy } from "@/lib/summarizer/strategy";
import { makeArticle } from "@test/helpers/test-helpers";

const BASE = { setting: "auto" as const, jsonReliable: true, inputChars: 1_000, autoThresholdChars: 45_000 };

describe("selectStrategy", () => {
  it("picks single-shot for a small document from a reliable model", () => {
    expect(selectStrategy(BASE)).toEqual({
      strategy: "single_shot",
      reason: "input 1000 chars < threshold 45000",
    });
  });

  it("picks hierarchical at or above the threshold", () => {
    expect(selectStrategy({ ...BASE, inputChars: 45_000 }).strategy).toBe("hierarchical");
  });

  it("forces hierarchical when the model is not JSON-reliable, even for a tiny document", () => {
    expect(selectStrategy({ ...BASE, jsonReliable: false, inputChars: 10 })).toEqual({
      strategy: "hierarchical",
      reason: "model not flagged as JSON-reliable",
    });
    expect(selectStrategy({ ...BASE, jsonReliable: false, setting: "single_shot" }).strategy).toBe("hierarchical");
  });

  it("honors an explicit setting for a reliable model", () => {
    expect(selectStrategy({ ...BASE, setting: "hierarchical" }).strategy).toBe("hierarchical");
    expect(selectStrategy({ ...BASE, setting: "single_shot", inputChars: 1_000_000 }).strategy).toBe("single_shot");
  });
});

describe("measureArticleChars", () => {
  it("measures the serialized document", () => {
    const article = makeArticle();
    expect(measureArticleChars(article)).toBe(JSON.stringify(article).length);
  });
});
