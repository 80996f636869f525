/**
 * Article document decoding and Results preconditions.
 *
 * @module summarizer/article
 */

import { z } from "zod";

import { asText } from "./decoders";
import { MissingResultsError } from "./errors";
import { isJsonObject } from "./json";
import type { ArticleDocument, Figure, ResultSection } from "./types";

// ============================================================================
// SCHEMA
// ============================================================================

const text = z.unknown().transform(asText);

const asObject = (value: unknown) => (isJsonObject(value) ? value : {});
const asArray = (value: unknown) => (Array.isArray(value) ? value : []);

const ResultSectionSchema = z.preprocess(
  asObject,
  z
    .object({ title: text, section_title: text, text: text, section_text: text })
    .transform((r): ResultSection => ({ title: r.title || r.section_title, text: r.text || r.section_text })),
);

const FigureSchema = z.preprocess(
  asObject,
  z
    .object({
      number: z.unknown(),
      figure: z.unknown(),
      label: z.unknown(),
      caption: text,
      text: text,
    })
    .transform((f): Figure => {
      const raw = [f.number, f.figure, f.label].find((v) => typeof v === "number" || (typeof v === "string" && v.trim()));
      const number = typeof raw === "number" ? raw : asText(raw);
      return { number, caption: f.caption || f.text };
    }),
);

export const ArticleDocumentSchema = z.preprocess(
  asObject,
  z.object({
    title: text,
    year: z.unknown().transform((v): string | number => (typeof v === "number" ? v : asText(v))),
    introduction: text,
    methods: text,
    results: z.preprocess(asArray, z.array(ResultSectionSchema)),
    discussion: text,
    figures: z.preprocess(asArray, z.array(FigureSchema)),
  }),
);

// ============================================================================
// OPERATIONS
// ============================================================================

/**
 * Decode the extraction step's JSON into an ArticleDocument. Results entries
 * with an empty title are dropped.
 *
 * @throws MissingResultsError when no titled Results subsection remains
 */
export function parseArticleDocument(raw: unknown): ArticleDocument {
  const article = ArticleDocumentSchema.parse(raw);
  const results = article.results.filter((section) => section.title.length > 0);
  assertHasResults(results);
  return { ...article, results };
}

/**
 * Titled Results subsections with trimmed title and text, in input order.
 */
export function getResultSections(article: ArticleDocument): ResultSection[] {
  return (article.results ?? [])
    .map((section) => ({ title: (section.title ?? "").trim(), text: (section.text ?? "").trim() }))
    .filter((section) => section.title.length > 0);
}

export function getResultTitles(article: ArticleDocument): string[] {
  return getResultSections(article).map((section) => section.title);
}

export function assertHasResults(results: readonly ResultSection[]): void {
  if (results.length === 0) throw new MissingResultsError();
}
