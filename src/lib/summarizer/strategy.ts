/**
 * Strategy Selector
 *
 * @module summarizer/strategy
 */

import type { ArticleDocument, GenerationStrategy, StrategySetting } from "./types";

export interface StrategyInput {
  setting: StrategySetting;
  /** Whether the model is known to honor JSON-only output */
  jsonReliable: boolean;
  /** Serialized size of the input document */
  inputChars: number;
  autoThresholdChars: number;
}

export interface StrategyDecision {
  strategy: GenerationStrategy;
  reason: string;
}

export function measureArticleChars(article: ArticleDocument): number {
  return JSON.stringify(article).length;
}

/**
 * Decision table:
 * - model not JSON-reliable → hierarchical, whatever the setting
 * - explicit setting → that strategy
 * - auto → single-shot below the size threshold, hierarchical otherwise
 */
export function selectStrategy(input: StrategyInput): StrategyDecision {
  if (!input.jsonReliable) {
    return { strategy: "hierarchical", reason: "model not flagged as JSON-reliable" };
  }
  if (input.setting !== "auto") {
    return { strategy: input.setting, reason: `explicit strategy "${input.setting}"` };
  }
  return input.inputChars < input.autoThresholdChars
    ? { strategy: "single_shot", reason: `input ${input.inputChars} chars < threshold ${input.autoThresholdChars}` }
    : { strategy: "hierarchical", reason: `input ${input.inputChars} chars >= threshold ${input.autoThresholdChars}` };
}
