#!/usr/bin/env npx tsx
/**
 * Summarize one extracted article JSON file.
 *
 * Usage:
 *   npx tsx scripts/summarize-article.ts <article.json> [--out file] [--model id]
 *     [--provider name] [--language code] [--strategy auto|single_shot|hierarchical]
 *     [--json-reliable] [--max-calls n] [--source-path path]
 *
 * Writes the summary document as pretty-printed JSON (default: <input>.summary.json)
 * and prints token usage.
 */

import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";

import { classifySummaryError } from "../src/lib/error-classification";
import { getSummaryConfig, normalizeProvider, STRATEGY_SETTINGS, type SummaryConfig } from "../src/lib/summary-config";
import { createAiSdkTransport, generateSummary, parseArticleDocument, resolveModel } from "../src/lib/summarizer";

const USAGE =
  "Usage: npx tsx scripts/summarize-article.ts <article.json> [--out file] [--model id] [--provider name] " +
  "[--language code] [--strategy auto|single_shot|hierarchical] [--json-reliable] [--max-calls n] [--source-path path]";

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: "string" },
      model: { type: "string" },
      provider: { type: "string" },
      language: { type: "string" },
      strategy: { type: "string" },
      "json-reliable": { type: "boolean" },
      "max-calls": { type: "string" },
      "source-path": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

function toOverrides(values: ReturnType<typeof parseCli>["values"]): Partial<SummaryConfig> {
  const overrides: Partial<SummaryConfig> = {};
  if (values.model) overrides.model = values.model;
  if (values.language) overrides.language = values.language;
  if (values["json-reliable"]) overrides.jsonReliable = true;

  if (values.provider) {
    const provider = normalizeProvider(values.provider);
    if (!provider) throw new Error(`Unknown provider "${values.provider}"`);
    overrides.llmProvider = provider;
  }
  if (values.strategy) {
    const strategy = STRATEGY_SETTINGS.find((s) => s === values.strategy);
    if (!strategy) throw new Error(`Unknown strategy "${values.strategy}"`);
    overrides.strategy = strategy;
  }
  if (values["max-calls"]) {
    const maxCalls = Number(values["max-calls"]);
    if (!Number.isInteger(maxCalls)) throw new Error(`--max-calls must be an integer, got "${values["max-calls"]}"`);
    overrides.maxCalls = maxCalls;
  }
  return overrides;
}

async function main(): Promise<number> {
  const { values, positionals } = parseCli(process.argv.slice(2));
  if (values.help || positionals.length !== 1) {
    console.error(USAGE);
    return values.help ? 0 : 1;
  }

  const inputPath = path.resolve(positionals[0]);
  const outPath = path.resolve(values.out ?? `${inputPath.replace(/\.json$/i, "")}.summary.json`);

  try {
    const config = getSummaryConfig(toOverrides(values));
    const raw: unknown = JSON.parse(await readFile(inputPath, "utf-8"));
    const article = parseArticleDocument(raw);

    const transport = createAiSdkTransport({
      model: resolveModel(config),
      temperature: config.temperature,
      requestTimeoutMs: config.requestTimeoutMs,
    });

    const result = await generateSummary(article, {
      config,
      transport,
      sourcePath: values["source-path"] ?? inputPath,
      onEvent: (message, progress) => console.log(`[${String(progress).padStart(3)}%] ${message}`),
    });

    await writeFile(outPath, JSON.stringify(result.summary, null, 2) + "\n", "utf-8");

    console.log(`Summary written to ${outPath}`);
    console.log(`Strategy: ${result.strategy}; calls: ${result.budget.attempts}/${result.budget.ceiling}`);
    console.log(
      `Tokens: input ${result.usage.inputTokens}, output ${result.usage.outputTokens}, total ${result.usage.totalTokens}`,
    );
    return 0;
  } catch (err) {
    const classified = classifySummaryError(err);
    console.error(classified.userMessage);
    if (classified.message !== classified.userMessage) console.error(`(${classified.category}) ${classified.message}`);
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
