/**
 * Error Classification
 *
 * Maps anything a summary run can throw to a category, a technical message,
 * a message fit for the user, and whether a caller may try the run again.
 *
 * @module error-classification
 */

import {
  CallBudgetExceededError,
  MissingResultsError,
  ModelOutputParseError,
  ResultsOrderError,
  SummaryGenerationError,
  TransportError,
  type SummaryErrorKind,
} from "./summarizer/errors";

export type SummaryErrorCategory =
  | "missing_results"
  | "precondition"
  | "budget_exceeded"
  | "rate_limit"
  | "timeout"
  | "auth"
  | "transport"
  | "parse"
  | "invariant"
  | "unknown";

export type ClassifiedSummaryError = {
  category: SummaryErrorCategory;
  message: string;
  userMessage: string;
  retriable: boolean;
};

/** Patterns indicating LLM provider rate limiting or overload */
const LLM_RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /capacity/i,
  /quota/i,
];

const LLM_AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /AbortError/i, /ETIMEDOUT/i, /ECONNRESET/i];

const KIND_CATEGORY: Record<SummaryErrorKind, SummaryErrorCategory> = {
  precondition: "precondition",
  transport: "transport",
  parse: "parse",
  invariant: "invariant",
  budget: "budget_exceeded",
};

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const status = "statusCode" in error ? error.statusCode : "status" in error ? error.status : undefined;
  return typeof status === "number" ? status : undefined;
}

function classifyTransport(error: TransportError): ClassifiedSummaryError {
  const cause = error.cause;
  const causeName = cause instanceof Error ? cause.name : "";
  const msg = error.message;
  const status = statusCodeOf(cause);

  if (causeName === "TimeoutError" || causeName === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return {
      category: "timeout",
      message: msg,
      userMessage: "The model request timed out. Try again later.",
      retriable: true,
    };
  }
  if (status === 401 || status === 403 || LLM_AUTH_PATTERNS.some((p) => p.test(msg))) {
    return {
      category: "auth",
      message: msg,
      userMessage: "The model provider rejected the credentials. Check the API key.",
      retriable: false,
    };
  }
  if (status === 429 || status === 529 || status === 503 || LLM_RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return {
      category: "rate_limit",
      message: msg,
      userMessage: "The model provider is rate limiting or overloaded. Try again later.",
      retriable: true,
    };
  }
  return {
    category: "transport",
    message: msg,
    userMessage: `The model request failed: ${msg}`,
    retriable: false,
  };
}

/**
 * Classify an error thrown by a summary run.
 */
export function classifySummaryError(error: unknown): ClassifiedSummaryError {
  if (error instanceof CallBudgetExceededError) {
    return {
      category: "budget_exceeded",
      message: error.message,
      userMessage: `Generation aborted for cost-safety: the run needed more than ${error.ceiling} model calls.`,
      retriable: false,
    };
  }

  if (error instanceof MissingResultsError) {
    return {
      category: "missing_results",
      message: error.message,
      userMessage: "The article has no Results subsections. Add them before generating a summary.",
      retriable: false,
    };
  }

  if (error instanceof TransportError) return classifyTransport(error);

  if (error instanceof ModelOutputParseError) {
    return {
      category: "parse",
      message: error.message,
      userMessage: "The model returned output that is not valid JSON. Try again or choose another model.",
      retriable: true,
    };
  }

  if (error instanceof ResultsOrderError) {
    return {
      category: "invariant",
      message: error.message,
      userMessage: "Internal error: Results summaries did not match the article's subsections.",
      retriable: false,
    };
  }

  if (error instanceof SummaryGenerationError) {
    return {
      category: KIND_CATEGORY[error.kind],
      message: error.message,
      userMessage: error.message,
      retriable: false,
    };
  }

  const msg = error instanceof Error ? error.message : String(error);
  return {
    category: "unknown",
    message: msg,
    userMessage: `Summary generation failed: ${msg}`,
    retriable: false,
  };
}
