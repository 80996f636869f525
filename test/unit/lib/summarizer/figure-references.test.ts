/**
 * Figure reference extraction tests
 */

import { describe, expect, it } from "vitest";

import {
  extractFigureRefs,
  extractRequiredFigureRefs,
  findMissingRefs,
  isSupplementaryRef,
  normalizeFigureRef,
  requiredRefKeys,
} from "@/lib/summarizer/figure-references";

describe("figure-references", () => {
  describe("normalizeFigureRef", () => {
    it("lowercases, collapses whitespace and folds dashes", () => {
      expect(normalizeFigureRef("  Fig.   2A–C ")).toBe("fig. 2a-c");
      expect(normalizeFigureRef("Figure 3—5")).toBe("figure 3-5");
    });
  });

  describe("extractFigureRefs", () => {
    it("returns distinct references in first-seen order", () => {
      const text = "As shown in Figure 3 and Fig. 2A–C, growth rose (figure 3; Figs. 4-5).";
      expect(extractFigureRefs(text)).toEqual(["Figure 3", "Fig. 2A–C", "Figs. 4-5"]);
    });

    it("does not swallow a dash that starts a new clause", () => {
      expect(extractFigureRefs("See Figure 3 - the control was flat.")).toEqual(["Figure 3"]);
    });

    it("does not take a one-letter word after a dash as a panel", () => {
      const text = "Growth rose (Figure 3 — a twofold change) and Figure 4 - a flat control.";
      expect(extractRequiredFigureRefs(text)).toEqual(["Figure 3", "Figure 4"]);
      const summary = "Growth doubled (Figure 3) while controls stayed flat (Figure 4).";
      expect(findMissingRefs(summary, extractRequiredFigureRefs(text))).toEqual([]);
    });

    it("returns an empty list for empty text", () => {
      expect(extractFigureRefs("")).toEqual([]);
    });

    it("is idempotent", () => {
      const text = "Figure 1 shows A; Fig. 2 shows B; Figure 1 again.";
      const once = extractFigureRefs(text);
      expect(extractFigureRefs(once.join(" "))).toEqual(once);
    });

    it("extracts the same set when unrelated text is reordered", () => {
      const a = "Cells grew (Figure 1). Mice lived longer (Fig. 2).";
      const b = "Mice lived longer (Fig. 2). Cells grew (Figure 1).";
      expect(new Set(extractFigureRefs(a).map(normalizeFigureRef))).toEqual(
        new Set(extractFigureRefs(b).map(normalizeFigureRef)),
      );
    });
  });

  describe("supplementary classification", () => {
    it.each(["Fig. S1", "Supplementary Figure 2", "Fig.S2", "Figure S 3", "supplementary fig. 4"])(
      "classifies %s as supplementary",
      (ref) => {
        expect(isSupplementaryRef(ref)).toBe(true);
      },
    );

    it.each(["Figure 3", "Figs. 4-5", "Fig. 2A–C", "Figures 3"])("classifies %s as main", (ref) => {
      expect(isSupplementaryRef(ref)).toBe(false);
    });

    it("never includes supplementary references in the required set", () => {
      const text = "Growth rose (Figure 1; Fig. S1) and fell (Supplementary Figure 2, Fig. 3).";
      expect(extractRequiredFigureRefs(text)).toEqual(["Figure 1", "Fig. 3"]);
      expect(requiredRefKeys(text)).toEqual(new Set(["figure 1", "fig. 3"]));
    });
  });

  describe("findMissingRefs", () => {
    it("compares on normalized form", () => {
      expect(findMissingRefs("as seen in FIGURE 1 and fig. 2a-c", ["Figure 1", "Fig. 2A–C"])).toEqual([]);
    });

    it("does not let a longer number satisfy a shorter reference", () => {
      expect(findMissingRefs("see Figure 10 and Figure 1b", ["Figure 1"])).toEqual(["Figure 1"]);
    });

    it("reports references that are absent, in the given order", () => {
      expect(findMissingRefs("Only Figure 2 here.", ["Figure 1", "Figure 2", "Figure 3"])).toEqual([
        "Figure 1",
        "Figure 3",
      ]);
    });
  });
});
