import { describe, expect, it } from "vitest";

import { countWords, packChunks, splitParagraphs } from "@/lib/summarizer/text-chunks";

describe("countWords", () => {
  it("counts letter and digit runs in any script", () => {
    expect(countWords("Cells grew 2-fold in vivo.")).toBe(6);
    expect(countWords("Клетки росли быстрее")).toBe(3);
    expect(countWords("")).toBe(0);
  });
});

describe("splitParagraphs", () => {
  it("splits on blank lines and drops empty paragraphs", () => {
    expect(splitParagraphs("First.\r\n\r\nSecond\nstill second.\n \n\n\nThird.")).toEqual([
      "First.",
      "Second\nstill second.",
      "Third.",
    ]);
  });
});

describe("packChunks", () => {
  it("packs paragraphs greedily within the limit", () => {
    expect(packChunks("aaaa\n\nbbbb\n\ncccc", 10)).toEqual(["aaaa\n\nbbbb", "cccc"]);
  });

  it("keeps an oversized paragraph as its own chunk", () => {
    expect(packChunks("short\n\n" + "x".repeat(20) + "\n\ntail", 8)).toEqual(["short", "x".repeat(20), "tail"]);
  });

  it("returns no chunks for empty text", () => {
    expect(packChunks("  \n\n ", 100)).toEqual([]);
  });

  it("rejects a non-positive size", () => {
    expect(() => packChunks("text", 0)).toThrow(RangeError);
  });
});
