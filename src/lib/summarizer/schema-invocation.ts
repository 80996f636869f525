/**
 * Schema-constrained invocation.
 *
 * The only path by which a stage talks to the model: count the attempt,
 * frame the prompt as JSON-only, send prompt + compact payload, parse the
 * reply and decode it against the call site's contract.
 *
 * @module summarizer/schema-invocation
 */

import { recordAttempt, type CallBudget } from "./budgets";
import type { OutputContract } from "./contracts";
import { debugLog, excerpt } from "./debug";
import { ModelOutputParseError } from "./errors";
import { parseJsonObjectResponse } from "./json";
import type { TextGenerationTransport } from "./llm";
import { recordUsage, type UsageLedger } from "./usage-ledger";

export const JSON_ONLY_INSTRUCTIONS = [
  "CRITICAL OUTPUT RULE:",
  "- Return ONLY a single valid JSON object.",
  "- No markdown, no code fences, no commentary.",
  "- Ensure the JSON is strictly parseable by a standard JSON parser.",
].join("\n");

export interface InvocationRequest<T> {
  label: string;
  prompt: string;
  payload: unknown;
  contract: OutputContract<T>;
}

export interface SchemaInvoker {
  readonly modelId: string;
  invoke<T>(request: InvocationRequest<T>): Promise<T>;
}

export interface SchemaInvokerDeps<R> {
  transport: TextGenerationTransport<R>;
  budget: CallBudget;
  ledger: UsageLedger;
}

export function buildEnforcedPrompt(prompt: string, shape: string): string {
  return `${prompt.trim()}\n\nOUTPUT JSON SCHEMA:\n${shape}\n\n${JSON_ONLY_INSTRUCTIONS}\n`;
}

export function createSchemaInvoker<R>(deps: SchemaInvokerDeps<R>): SchemaInvoker {
  const { transport, budget, ledger } = deps;

  async function invoke<T>(request: InvocationRequest<T>): Promise<T> {
    const { label, contract } = request;

    // Budget first: an attempt past the ceiling is never sent
    recordAttempt(budget, label);

    const prompt = buildEnforcedPrompt(request.prompt, contract.shape);
    const payloadText = JSON.stringify(request.payload);

    debugLog(`[Summary] Request "${label}" (${contract.name})`, {
      attempt: budget.attempts,
      ceiling: budget.ceiling,
      promptChars: prompt.length,
      payloadChars: payloadText.length,
    });

    const response = await transport.send({ label, prompt, payloadText });

    const usage = transport.extractUsage(response, label);
    recordUsage(ledger, usage);

    const text = transport.extractText(response);
    debugLog(`[Summary] Response "${label}"`, {
      chars: text.length,
      excerpt: excerpt(text),
      usage: { input: usage.inputTokens, output: usage.outputTokens, total: usage.totalTokens },
    });

    if (!text.trim()) {
      throw new ModelOutputParseError(`Model returned an empty response for "${label}".`, label, text);
    }

    const parsed = parseJsonObjectResponse(text);
    if (!parsed) {
      throw new ModelOutputParseError(
        `Failed to parse model JSON output for "${label}". Raw output:\n${excerpt(text, 2000)}`,
        label,
        text,
      );
    }

    const decoded = contract.schema.safeParse(parsed);
    if (!decoded.success) {
      const issues = decoded.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`).join("; ");
      throw new ModelOutputParseError(
        `Model output for "${label}" does not match the ${contract.name} contract: ${issues}`,
        label,
        text,
        { cause: decoded.error },
      );
    }
    return decoded.data;
  }

  return { modelId: transport.modelId, invoke };
}
