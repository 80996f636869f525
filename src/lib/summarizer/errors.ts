/**
 * Summary generation errors.
 *
 * Every fatal condition of a run is one of these; `kind` lets a caller tell
 * budget exhaustion apart from a model or transport failure.
 *
 * @module summarizer/errors
 */

export type SummaryErrorKind = "precondition" | "transport" | "parse" | "invariant" | "budget";

export class SummaryGenerationError extends Error {
  constructor(
    message: string,
    public readonly kind: SummaryErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SummaryGenerationError";
  }
}

/** Input document has no Results subsections. Raised before any remote call. */
export class MissingResultsError extends SummaryGenerationError {
  constructor(message = "No Results subsections found in article document.") {
    super(message, "precondition");
    this.name = "MissingResultsError";
  }
}

/** Configuration or prompt template problem detected before the run starts. */
export class SummaryPreconditionError extends SummaryGenerationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "precondition", options);
    this.name = "SummaryPreconditionError";
  }
}

export class TransportError extends SummaryGenerationError {
  constructor(
    message: string,
    public readonly label: string,
    options?: { cause?: unknown },
  ) {
    super(message, "transport", options);
    this.name = "TransportError";
  }
}

export class ModelOutputParseError extends SummaryGenerationError {
  constructor(
    message: string,
    public readonly label: string,
    public readonly rawText: string,
    options?: { cause?: unknown },
  ) {
    super(message, "parse", options);
    this.name = "ModelOutputParseError";
  }
}

/** Produced Results titles differ from the input titles. Indicates a logic defect. */
export class ResultsOrderError extends SummaryGenerationError {
  constructor(
    public readonly expected: string[],
    public readonly actual: string[],
  ) {
    super(
      "Internal error: Results mini-summaries titles/order mismatch.\n" +
        `Expected: ${JSON.stringify(expected)}\nGot: ${JSON.stringify(actual)}`,
      "invariant",
    );
    this.name = "ResultsOrderError";
  }
}

export class CallBudgetExceededError extends SummaryGenerationError {
  constructor(
    public readonly attempts: number,
    public readonly ceiling: number,
    public readonly label: string,
  ) {
    super(
      `Safety stop: call "${label}" would be attempt ${attempts} of a ${ceiling}-call budget. ` +
        "Aborting to prevent runaway costs.",
      "budget",
    );
    this.name = "CallBudgetExceededError";
  }
}

export function isSummaryGenerationError(error: unknown): error is SummaryGenerationError {
  return error instanceof SummaryGenerationError;
}

/** Errors the Map-stage retry policy may answer with one more attempt. */
export function isRecoverableCallError(error: unknown): boolean {
  return error instanceof TransportError || error instanceof ModelOutputParseError;
}
