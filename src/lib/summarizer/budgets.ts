/**
 * Call budget for one generation run.
 *
 * A run issues an input-dependent number of model calls (one per Results
 * subsection, one per figure batch, repairs, post-fill). The budget is a hard
 * ceiling on attempts: the attempt that crosses it is never sent, and the
 * whole run aborts.
 *
 * @module summarizer/budgets
 */

import { CallBudgetExceededError } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export interface CallBudget {
  /** Attempts made so far, including the one that exceeded the ceiling */
  attempts: number;

  /** Maximum attempts allowed in this run */
  readonly ceiling: number;

  /** Attempt counts per call label prefix (e.g. "section", "figures") */
  attemptsByStage: Map<string, number>;

  budgetExceeded: boolean;

  exceedReason?: string;
}

export const DEFAULT_MAX_CALLS = 20;

// ============================================================================
// TRACKER
// ============================================================================

export function createCallBudget(ceiling: number = DEFAULT_MAX_CALLS): CallBudget {
  if (!Number.isInteger(ceiling) || ceiling < 1) {
    throw new RangeError(`Call budget ceiling must be a positive integer, got ${ceiling}`);
  }
  return {
    attempts: 0,
    ceiling,
    attemptsByStage: new Map(),
    budgetExceeded: false,
  };
}

function stageOf(label: string): string {
  const idx = label.indexOf(":");
  return idx > 0 ? label.slice(0, idx) : label;
}

/**
 * Count one call attempt. Throws once the count passes the ceiling; after
 * that every further attempt throws as well.
 */
export function recordAttempt(budget: CallBudget, label: string): void {
  budget.attempts++;
  const stage = stageOf(label);
  budget.attemptsByStage.set(stage, (budget.attemptsByStage.get(stage) ?? 0) + 1);

  if (budget.budgetExceeded || budget.attempts > budget.ceiling) {
    budget.budgetExceeded = true;
    budget.exceedReason ??= `Attempt ${budget.attempts} > ceiling ${budget.ceiling} at "${label}"`;
    throw new CallBudgetExceededError(budget.attempts, budget.ceiling, label);
  }
}

// ============================================================================
// STATS
// ============================================================================

export function getBudgetStats(budget: CallBudget): {
  attempts: number;
  ceiling: number;
  remaining: number;
  percentUsed: number;
  byStage: Record<string, number>;
  budgetExceeded: boolean;
} {
  return {
    attempts: budget.attempts,
    ceiling: budget.ceiling,
    remaining: Math.max(0, budget.ceiling - budget.attempts),
    percentUsed: Math.round((Math.min(budget.attempts, budget.ceiling) / budget.ceiling) * 100),
    byStage: Object.fromEntries(budget.attemptsByStage),
    budgetExceeded: budget.budgetExceeded,
  };
}
