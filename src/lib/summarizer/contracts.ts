/**
 * Output contracts: the JSON shape each call site asks for, and the decoder
 * that turns the parsed object into a typed record.
 *
 * @module summarizer/contracts
 */

import type { z } from "zod";

import {
  FigureNarrativeOutputSchema,
  KeyPointsOutputSchema,
  MiniSummaryOutputSchema,
  RawSummarySchema,
  SectionTextOutputSchema,
} from "./decoders";

export interface OutputContract<T> {
  name: string;
  /** JSON shape hint embedded in the prompt */
  shape: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const MINI_SUMMARY_CONTRACT = {
  name: "mini_summary",
  shape: '{"section_title": "...", "mini_summary": "..."}',
  schema: MiniSummaryOutputSchema,
} satisfies OutputContract<z.infer<typeof MiniSummaryOutputSchema>>;

export const FIGURE_NARRATIVE_CONTRACT = {
  name: "figure_narrative",
  shape: '{"chunk_id": <int>, "narrative": "<text>"}',
  schema: FigureNarrativeOutputSchema,
} satisfies OutputContract<z.infer<typeof FigureNarrativeOutputSchema>>;

export const SUMMARY_CONTRACT = {
  name: "summary",
  shape: JSON.stringify(
    {
      header: { title: "...", year: "...", source_path: "...", model: "...", language: "..." },
      key_points: ["..."],
      introduction: "...",
      results: [{ section_title: "...", mini_summary: "..." }],
      discussion: "...",
      figures: { narrative: "...", items: [{ figure: "...", summary: "..." }] },
      abbreviations: [{ abbr: "...", expanded: "..." }],
    },
    null,
    2,
  ),
  schema: RawSummarySchema,
} satisfies OutputContract<z.infer<typeof RawSummarySchema>>;

export const SECTION_TEXT_CONTRACT = {
  name: "section_text",
  shape: '{"summary": "..."}',
  schema: SectionTextOutputSchema,
} satisfies OutputContract<z.infer<typeof SectionTextOutputSchema>>;

export const KEY_POINTS_CONTRACT = {
  name: "key_points",
  shape: '{"key_points": ["...", "..."]}',
  schema: KeyPointsOutputSchema,
} satisfies OutputContract<z.infer<typeof KeyPointsOutputSchema>>;
