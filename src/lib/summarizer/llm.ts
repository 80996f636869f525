/**
 * Article Summarizer - LLM Provider Selection and Transport
 *
 * Handles model selection and the narrow response adapter every stage talks
 * through: send one request, read its text, read its usage.
 *
 * @module summarizer/llm
 */

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import { generateText, type LanguageModel, type LanguageModelUsage } from "ai";

import type { LLMProviderType, SummaryConfig } from "../summary-config";
import { TransportError } from "./errors";
import type { UsageRecord } from "./types";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: LLMProviderType;
  modelName: string;
  model: LanguageModel;
}

export function detectProviderFromModelName(modelName: string): LLMProviderType {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  return "openai";
}

function buildModelInfo(provider: LLMProviderType, modelName: string): ModelInfo {
  if (provider === "anthropic") {
    return { provider, modelName, model: anthropic(modelName) };
  }
  if (provider === "google") {
    return { provider, modelName, model: google(modelName) };
  }
  if (provider === "mistral") {
    return { provider, modelName, model: mistral(modelName) };
  }
  return { provider: "openai", modelName, model: openai(modelName) };
}

/**
 * Get the LLM model for a run. An explicit provider wins; "auto" infers it
 * from the model name.
 */
export function resolveModel(config: Pick<SummaryConfig, "llmProvider" | "model">): ModelInfo {
  const provider =
    config.llmProvider === "auto" ? detectProviderFromModelName(config.model) : config.llmProvider;
  return buildModelInfo(provider, config.model);
}

// ============================================================================
// TRANSPORT
// ============================================================================

export interface TransportRequest {
  /** Call label, e.g. "section:3" or "figures:1" */
  label: string;
  /** Enforced prompt text (instructions + JSON-only block) */
  prompt: string;
  /** Compact JSON payload */
  payloadText: string;
}

/**
 * One remote text-generation backend. `send` issues exactly one request; the
 * two extractors are the only code that knows the response shape.
 */
export interface TextGenerationTransport<R = unknown> {
  readonly modelId: string;
  send(request: TransportRequest): Promise<R>;
  extractText(response: R): string;
  extractUsage(response: R, label: string): UsageRecord;
}

export interface AiSdkResponse {
  text: string;
  usage: LanguageModelUsage;
  modelId: string;
}

export interface AiSdkTransportOptions {
  model: ModelInfo;
  temperature: number;
  requestTimeoutMs: number;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Transport backed by the AI SDK's generateText.
 * SDK retries are disabled: every request that reaches the provider is one budgeted attempt.
 */
export function createAiSdkTransport(options: AiSdkTransportOptions): TextGenerationTransport<AiSdkResponse> {
  const { model, temperature, requestTimeoutMs } = options;

  return {
    modelId: model.modelName,

    async send(request: TransportRequest): Promise<AiSdkResponse> {
      try {
        const result = await generateText({
          model: model.model,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: request.prompt },
                { type: "text", text: request.payloadText },
              ],
            },
          ],
          temperature,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(requestTimeoutMs),
        });
        return {
          text: result.text,
          usage: result.usage,
          modelId: result.response?.modelId || model.modelName,
        };
      } catch (err) {
        throw new TransportError(
          `Model request "${request.label}" failed (${model.provider}/${model.modelName}): ${describeError(err)}`,
          request.label,
          { cause: err },
        );
      }
    },

    extractText(response: AiSdkResponse): string {
      return typeof response.text === "string" ? response.text : "";
    },

    extractUsage(response: AiSdkResponse, label: string): UsageRecord {
      const inputTokens = response.usage?.inputTokens ?? 0;
      const outputTokens = response.usage?.outputTokens ?? 0;
      return {
        label,
        model: response.modelId,
        inputTokens,
        outputTokens,
        totalTokens: response.usage?.totalTokens ?? inputTokens + outputTokens,
        raw: response.usage,
      };
    },
  };
}
