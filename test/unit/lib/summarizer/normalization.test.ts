/**
 * Output normalizer tests
 *
 * @module summarizer/normalization.test
 */

import { describe, expect, it } from "vitest";

import {
  normalizeAbbreviations,
  normalizeHeader,
  normalizeResults,
  normalizeSummary,
  type NormalizationContext,
} from "@/lib/summarizer/normalization";
import { MISSING_SECTION_PLACEHOLDER } from "@/lib/summarizer/types";

function context(overrides: Partial<NormalizationContext> = {}): NormalizationContext {
  return {
    resultTitles: ["Discussion of X", "Effects of Y"],
    article: { title: "Source Title", year: 2021 },
    model: "test-model",
    language: "eng",
    sourcePath: "articles/source.pdf",
    ...overrides,
  };
}

// ============================================================================
// RESULTS
// ============================================================================

describe("normalizeResults", () => {
  const titles = ["Discussion of X", "Effects of Y"];

  it("fills a title missing from a map-shaped result with the placeholder", () => {
    expect(normalizeResults({ "Discussion of X": "X was discussed." }, titles)).toEqual([
      { section_title: "Discussion of X", mini_summary: "X was discussed." },
      { section_title: "Effects of Y", mini_summary: "—" },
    ]);
  });

  it("follows the input order, not the model's, and ignores extra entries", () => {
    const raw = [
      { section_title: "Effects of Y", mini_summary: "Y summary." },
      { section_title: "Invented section", mini_summary: "Nope." },
      { section_title: "Discussion of X", mini_summary: "X summary." },
    ];
    expect(normalizeResults(raw, titles)).toEqual([
      { section_title: "Discussion of X", mini_summary: "X summary." },
      { section_title: "Effects of Y", mini_summary: "Y summary." },
    ]);
  });

  it("accepts alternate keys and a map of objects", () => {
    expect(normalizeResults([{ title: "Discussion of X", summary: "From list." }], titles)[0].mini_summary).toBe(
      "From list.",
    );
    expect(normalizeResults({ "Effects of Y": { text: "From map." } }, titles)[1].mini_summary).toBe("From map.");
  });

  it("matches titles ignoring case and spacing when no exact match exists", () => {
    expect(normalizeResults([{ section_title: "effects  of y", mini_summary: "Loose." }], titles)[1]).toEqual({
      section_title: "Effects of Y",
      mini_summary: "Loose.",
    });
  });

  it("uses map-stage fallbacks before the placeholder", () => {
    const fallbacks = [{ section_title: "Effects of Y", mini_summary: "Map-stage text." }];
    expect(normalizeResults({ "Effects of Y": "—" }, titles, fallbacks)).toEqual([
      { section_title: "Discussion of X", mini_summary: MISSING_SECTION_PLACEHOLDER },
      { section_title: "Effects of Y", mini_summary: "Map-stage text." },
    ]);
  });

  it("keeps repeated titles apart when the list has one entry per title", () => {
    const repeated = ["Results", "Results"];
    expect(
      normalizeResults(
        [
          { section_title: "Results", mini_summary: "First block." },
          { section_title: "Results", mini_summary: "Second block." },
        ],
        repeated,
      ).map((r) => r.mini_summary),
    ).toEqual(["First block.", "Second block."]);
  });

  it("keeps repeated titles apart in the map-stage fallbacks", () => {
    const fallbacks = [
      { section_title: "Results", mini_summary: "First map-stage text." },
      { section_title: "Results", mini_summary: "Second map-stage text." },
    ];
    expect(normalizeResults([], ["Results", "Results"], fallbacks).map((r) => r.mini_summary)).toEqual([
      "First map-stage text.",
      "Second map-stage text.",
    ]);
  });

  it("ignores a positional entry whose title disagrees", () => {
    const raw = [
      { section_title: "Effects of Y", mini_summary: "Y summary." },
      { section_title: "Discussion of X", mini_summary: "X summary." },
    ];
    expect(normalizeResults(raw, titles).map((r) => r.mini_summary)).toEqual(["X summary.", "Y summary."]);
  });

  it("always returns one entry per input title for unusable output", () => {
    for (const raw of [null, 42, "text", [], {}]) {
      expect(normalizeResults(raw, titles).map((r) => r.section_title)).toEqual(titles);
    }
  });
});

// ============================================================================
// HEADER
// ============================================================================

describe("normalizeHeader", () => {
  it("prefers model values, then defaults, then the document, then run parameters", () => {
    const header = normalizeHeader(
      { title: "Model Title", year: "" },
      context({ headerDefaults: { year: "1999", source_path: "" } }),
    );
    expect(header).toEqual({
      title: "Model Title",
      year: "1999",
      source_path: "articles/source.pdf",
      model: "test-model",
      language: "EN",
    });
  });

  it("falls back to the document title and year", () => {
    expect(normalizeHeader(undefined, context())).toEqual({
      title: "Source Title",
      year: "2021",
      source_path: "articles/source.pdf",
      model: "test-model",
      language: "EN",
    });
  });
});

// ============================================================================
// ABBREVIATIONS
// ============================================================================

describe("normalizeAbbreviations", () => {
  it("deduplicates case-insensitively and sorts by abbreviation", () => {
    const raw = [
      { abbr: "ROS", expanded: "reactive oxygen species" },
      { abbr: "DNA", expanded: "" },
      { abbr: "dna", expanded: "deoxyribonucleic acid" },
      { abbr: "ATP", expanded: "adenosine triphosphate" },
      { abbr: "Ros", expanded: "something else" },
    ];
    expect(normalizeAbbreviations(raw)).toEqual([
      { abbr: "ATP", expanded: "adenosine triphosphate" },
      { abbr: "DNA", expanded: "deoxyribonucleic acid" },
      { abbr: "ROS", expanded: "reactive oxygen species" },
    ]);
  });

  it("accepts a mapping and 'ABBR: expansion' strings", () => {
    expect(normalizeAbbreviations({ PCR: "polymerase chain reaction" })).toEqual([
      { abbr: "PCR", expanded: "polymerase chain reaction" },
    ]);
    expect(normalizeAbbreviations(["GFP: green fluorescent protein", "WT - wild type"])).toEqual([
      { abbr: "GFP", expanded: "green fluorescent protein" },
      { abbr: "WT", expanded: "wild type" },
    ]);
  });

  it("drops entries without an abbreviation or expansion", () => {
    expect(normalizeAbbreviations([{ abbr: "", expanded: "x" }, { abbr: "Y" }, "lonely"])).toEqual([]);
  });
});

// ============================================================================
// DOCUMENT
// ============================================================================

describe("normalizeSummary", () => {
  it("yields a fully populated document from a sparse object", () => {
    expect(normalizeSummary({ results: { "Discussion of X": "X." } }, context())).toEqual({
      header: {
        title: "Source Title",
        year: "2021",
        source_path: "articles/source.pdf",
        model: "test-model",
        language: "EN",
      },
      key_points: [],
      introduction: "",
      results: [
        { section_title: "Discussion of X", mini_summary: "X." },
        { section_title: "Effects of Y", mini_summary: "—" },
      ],
      discussion: "",
      figures: { narrative: "", items: [] },
      abbreviations: [],
    });
  });

  it("coerces figures and keeps only complete items", () => {
    const summary = normalizeSummary(
      {
        figures: {
          narrative: "Figures link to results.",
          items: [
            { figure: "Figure 1", summary: "Growth curves." },
            { label: 2, text: "Survival." },
            { figure: "Figure 3", summary: "" },
            { summary: "No label." },
          ],
        },
      },
      context(),
    );
    expect(summary.figures).toEqual({
      narrative: "Figures link to results.",
      items: [
        { figure: "Figure 1", summary: "Growth curves." },
        { figure: "2", summary: "Survival." },
      ],
    });
  });

  it("treats a figures string as the narrative and a list as items", () => {
    expect(normalizeSummary({ figures: "Only prose." }, context()).figures).toEqual({
      narrative: "Only prose.",
      items: [],
    });
    expect(normalizeSummary({ figures: [{ figure: "Fig. 1", summary: "A." }] }, context()).figures).toEqual({
      narrative: "",
      items: [{ figure: "Fig. 1", summary: "A." }],
    });
  });

  it("uses the batched narrative when the model left it empty", () => {
    const summary = normalizeSummary(
      { figures: { narrative: "" } },
      context({ fallbacks: { figuresNarrative: "Batched narrative." } }),
    );
    expect(summary.figures.narrative).toBe("Batched narrative.");
  });

  it("splits a key points string into bullets", () => {
    expect(normalizeSummary({ key_points: "- First\n2. Second\n\n• Third" }, context()).key_points).toEqual([
      "First",
      "Second",
      "Third",
    ]);
  });

  it("does not throw on a non-object", () => {
    expect(normalizeSummary("garbage", context()).results).toHaveLength(2);
  });
});
