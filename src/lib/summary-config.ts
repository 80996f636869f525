/**
 * Summary Configuration
 *
 * Zod schema, defaults and resolution (overrides → environment → defaults)
 * for a summary generation run.
 *
 * @module summary-config
 */

import { z } from "zod";
import { SummaryPreconditionError } from "./summarizer/errors";

// ============================================================================
// SCHEMA
// ============================================================================

export const LLM_PROVIDERS = ["openai", "anthropic", "google", "mistral"] as const;
export type LLMProviderType = (typeof LLM_PROVIDERS)[number];
export const LLM_PROVIDER_SETTINGS = ["auto", "openai", "anthropic", "google", "mistral"] as const;
export type LLMProviderSetting = (typeof LLM_PROVIDER_SETTINGS)[number];

export const STRATEGY_SETTINGS = ["auto", "single_shot", "hierarchical"] as const;

export const HeaderDefaultsSchema = z.object({
  title: z.string().optional(),
  year: z.string().optional(),
  source_path: z.string().optional(),
  model: z.string().optional(),
  language: z.string().optional(),
});

export type HeaderDefaults = z.infer<typeof HeaderDefaultsSchema>;

export const SummaryConfigSchema = z.object({
  /** "auto" infers the provider from the model name */
  llmProvider: z.enum(LLM_PROVIDER_SETTINGS),
  model: z.string().trim().min(1),
  /** Target language code: EN, RU, or any other label passed through */
  language: z.string().trim().min(1),
  strategy: z.enum(STRATEGY_SETTINGS),
  /** Whether the model reliably honors JSON-only output; false forces map-reduce */
  jsonReliable: z.boolean(),
  /** Serialized input size below which "auto" picks single-shot */
  autoThresholdChars: z.number().int().min(1000).max(2_000_000),
  figuresBatchSize: z.number().int().min(1).max(50),
  /** Hard ceiling on model calls per run (including repairs) */
  maxCalls: z.number().int().min(1).max(500),
  requestTimeoutMs: z.number().int().min(1000).max(600_000),
  temperature: z.number().min(0).max(2),
  /** Mini-summaries shorter than this trigger one regeneration */
  minMiniSummaryChars: z.number().int().min(0).max(2000),
  /** Length of introduction/discussion excerpts sent to the reduce call */
  reduceExcerptChars: z.number().int().min(200).max(100_000),
  postFillTargetRatio: z.number().gt(0).max(1),
  postFillMinWords: z.number().int().min(10).max(2000),
  postFillChunkChars: z.number().int().min(500).max(200_000),
  headerDefaults: HeaderDefaultsSchema,
});

export type SummaryConfig = z.infer<typeof SummaryConfigSchema>;

export const DEFAULT_SUMMARY_CONFIG: SummaryConfig = {
  llmProvider: "auto",
  model: "gpt-4.1-mini",
  language: "EN",
  strategy: "auto",
  jsonReliable: false,
  autoThresholdChars: 60_000,
  figuresBatchSize: 10,
  maxCalls: 20,
  requestTimeoutMs: 120_000,
  temperature: 0.2,
  minMiniSummaryChars: 40,
  reduceExcerptChars: 4000,
  postFillTargetRatio: 0.2,
  postFillMinWords: 60,
  postFillChunkChars: 12_000,
  headerDefaults: {},
};

// ============================================================================
// ENVIRONMENT PARSING HELPERS
// ============================================================================

type Env = Record<string, string | undefined>;

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isInteger(n) ? n : undefined;
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
  const v = value?.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  return undefined;
}

function parseStrategyEnv(value: string | undefined): SummaryConfig["strategy"] | undefined {
  const v = value?.trim().toLowerCase();
  return STRATEGY_SETTINGS.find((s) => s === v);
}

/**
 * Map provider aliases ("claude", "gemini", "gpt") to a provider id.
 */
export function normalizeProvider(raw: string | undefined): LLMProviderSetting | undefined {
  const p = (raw ?? "").toLowerCase().trim();
  if (p === "auto") return "auto";
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  if (p === "openai" || p === "gpt") return "openai";
  return undefined;
}

function readEnvOverrides(env: Env): Partial<SummaryConfig> {
  const fromEnv: Partial<SummaryConfig> = {
    llmProvider: normalizeProvider(env.SUMMARY_LLM_PROVIDER),
    model: env.SUMMARY_MODEL?.trim() || undefined,
    language: env.SUMMARY_LANGUAGE?.trim() || undefined,
    strategy: parseStrategyEnv(env.SUMMARY_STRATEGY),
    jsonReliable: parseBoolEnv(env.SUMMARY_JSON_RELIABLE),
    autoThresholdChars: parseIntEnv(env.SUMMARY_AUTO_THRESHOLD_CHARS),
    figuresBatchSize: parseIntEnv(env.SUMMARY_FIGURES_BATCH_SIZE),
    maxCalls: parseIntEnv(env.SUMMARY_MAX_CALLS),
    requestTimeoutMs: parseIntEnv(env.SUMMARY_REQUEST_TIMEOUT_MS),
  };
  return dropUndefined(fromEnv);
}

const CONFIG_KEYS = SummaryConfigSchema.keyof().options;

function copyDefined<K extends keyof SummaryConfig>(
  out: Partial<SummaryConfig>,
  src: Partial<SummaryConfig>,
  key: K,
): void {
  const value = src[key];
  if (value !== undefined) out[key] = value;
}

function dropUndefined(values: Partial<SummaryConfig>): Partial<SummaryConfig> {
  const out: Partial<SummaryConfig> = {};
  for (const key of CONFIG_KEYS) copyDefined(out, values, key);
  return out;
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Get the summary configuration.
 *
 * Resolution order:
 * 1. Explicit overrides
 * 2. Environment variables
 * 3. Default values
 *
 * @throws SummaryPreconditionError when the resolved values fail validation
 */
export function getSummaryConfig(
  overrides: Partial<SummaryConfig> = {},
  env: Env = process.env,
): SummaryConfig {
  const merged = {
    ...DEFAULT_SUMMARY_CONFIG,
    ...readEnvOverrides(env),
    ...dropUndefined(overrides),
  };
  const parsed = SummaryConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    throw new SummaryPreconditionError(`Invalid summary configuration: ${issues}`);
  }
  return parsed.data;
}
