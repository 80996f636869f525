/**
 * Map Stage: Results section summarizer.
 *
 * One mini-summary per Results subsection, in input order. Per section:
 * first attempt, at most one regeneration (unusable text or a failed call),
 * at most one repair (missing figure references). The emitted title is the
 * model's echo of the kept text (the input title when the echo is empty);
 * the caller checks it against the input titles.
 *
 * @module summarizer/section-summaries
 */

import { MINI_SUMMARY_CONTRACT } from "./contracts";
import type { StageContext } from "./context";
import { debugLog, excerpt } from "./debug";
import type { MiniSummaryOutput } from "./decoders";
import { isRecoverableCallError, ModelOutputParseError, ResultsOrderError, TransportError } from "./errors";
import { extractRequiredFigureRefs, findMissingRefs } from "./figure-references";
import type { MiniSummary, ResultSection } from "./types";

const PLACEHOLDER_SUMMARIES = new Set(["", "—", "–", "-", "n/a"]);

/**
 * Empty, a placeholder dash, or shorter than `minChars`.
 */
export function isUnusableMiniSummary(text: string, minChars: number): boolean {
  const t = (text ?? "").trim();
  if (PLACEHOLDER_SUMMARIES.has(t.toLowerCase())) return true;
  return t.length < minChars;
}

function referencesClause(ctx: StageContext, requiredRefs: string[]): string {
  if (requiredRefs.length === 0) return "";
  return ctx.prompts.render("MINI_SUMMARY_REFERENCES", { REQUIRED_REFS: requiredRefs.join("; ") });
}

function echoedTitle(label: string, expected: string, output: MiniSummaryOutput): string {
  if (!output.section_title) return expected;
  if (output.section_title !== expected) {
    debugLog(`[Summary] "${label}" echoed a different section title`, { expected, echoed: output.section_title });
  }
  return output.section_title;
}

/** Prompt wording for why a regeneration was needed. */
function retryReason(error: unknown, minChars: number): string {
  if (error instanceof TransportError) return "the request failed before a reply arrived";
  if (error instanceof ModelOutputParseError) return "the reply was not a valid JSON object";
  return `the mini-summary was empty, a placeholder, or shorter than ${minChars} characters`;
}

/**
 * Summarize one Results subsection. `index` is zero-based and only used for
 * call labels.
 */
export async function summarizeResultSection(
  ctx: StageContext,
  section: ResultSection,
  index: number,
): Promise<MiniSummary> {
  const label = `section:${index + 1}`;
  const requiredRefs = extractRequiredFigureRefs(section.text);
  const refsClause = referencesClause(ctx, requiredRefs);
  const payload = { section_title: section.title, section_text: section.text };

  let title = section.title;
  let text = "";
  let firstError: unknown = null;
  try {
    const first = await ctx.invoker.invoke({
      label,
      prompt: ctx.prompts.render("MINI_SUMMARY", { LANGUAGE: ctx.languageLabel, REFERENCES_CLAUSE: refsClause }),
      payload,
      contract: MINI_SUMMARY_CONTRACT,
    });
    title = echoedTitle(label, section.title, first);
    text = first.mini_summary;
  } catch (err) {
    if (!isRecoverableCallError(err)) throw err;
    firstError = err;
  }

  if (firstError !== null || isUnusableMiniSummary(text, ctx.config.minMiniSummaryChars)) {
    debugLog(`[Summary] Regenerating "${label}"`, {
      reason: firstError !== null ? String(firstError) : "unusable mini-summary",
      previous: excerpt(text, 200),
    });
    const regenerated = await ctx.invoker.invoke({
      label: `${label}:regenerate`,
      prompt: ctx.prompts.render("MINI_SUMMARY_REGENERATE", {
        LANGUAGE: ctx.languageLabel,
        REFERENCES_CLAUSE: refsClause,
        MIN_CHARS: String(ctx.config.minMiniSummaryChars),
        RETRY_REASON: retryReason(firstError, ctx.config.minMiniSummaryChars),
      }),
      payload,
      contract: MINI_SUMMARY_CONTRACT,
    });
    title = echoedTitle(`${label}:regenerate`, section.title, regenerated);
    text = regenerated.mini_summary;
  }

  const missing = findMissingRefs(text, requiredRefs);
  if (missing.length > 0) {
    debugLog(`[Summary] Repairing "${label}": missing figure references`, { missing });
    const repaired = await ctx.invoker.invoke({
      label: `${label}:repair`,
      prompt: ctx.prompts.render("MINI_SUMMARY_REPAIR", {
        LANGUAGE: ctx.languageLabel,
        MISSING_REFS: missing.join("; "),
      }),
      payload: { section_title: section.title, mini_summary: text },
      contract: MINI_SUMMARY_CONTRACT,
    });
    title = echoedTitle(`${label}:repair`, section.title, repaired);

    const stillMissing = findMissingRefs(repaired.mini_summary, requiredRefs);
    if (stillMissing.length > 0) {
      debugLog(`[Summary] "${label}" still misses references after repair; accepting as-is`, { stillMissing });
    }
    text = repaired.mini_summary;
  }

  return { section_title: title, mini_summary: text };
}

/**
 * Summarize all Results subsections sequentially, in input order.
 */
export async function summarizeResultSections(
  ctx: StageContext,
  sections: readonly ResultSection[],
  onSectionDone?: (done: number, total: number) => void,
): Promise<MiniSummary[]> {
  const out: MiniSummary[] = [];
  for (let i = 0; i < sections.length; i++) {
    out.push(await summarizeResultSection(ctx, sections[i], i));
    onSectionDone?.(i + 1, sections.length);
  }
  return out;
}

/**
 * Fatal when produced titles differ from the expected list in value, order or length.
 */
export function assertTitlesMatch(expected: readonly string[], produced: readonly MiniSummary[]): void {
  const actual = produced.map((item) => item.section_title);
  const same = actual.length === expected.length && actual.every((title, i) => title === expected[i]);
  if (!same) throw new ResultsOrderError([...expected], actual);
}
