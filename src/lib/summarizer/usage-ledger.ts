/**
 * Token usage accounting for one run. Observational only.
 *
 * @module summarizer/usage-ledger
 */

import type { UsageRecord, UsageTotals } from "./types";

export interface UsageLedger {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  calls: UsageRecord[];
}

export function createUsageLedger(): UsageLedger {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0, calls: [] };
}

export function recordUsage(ledger: UsageLedger, record: UsageRecord): void {
  ledger.inputTokens += record.inputTokens;
  ledger.outputTokens += record.outputTokens;
  // Some providers omit the total; fall back to the sum.
  ledger.totalTokens += record.totalTokens || record.inputTokens + record.outputTokens;
  ledger.calls.push(record);
}

export function getUsageTotals(ledger: UsageLedger): UsageTotals {
  return {
    inputTokens: ledger.inputTokens,
    outputTokens: ledger.outputTokens,
    totalTokens: ledger.totalTokens,
    calls: [...ledger.calls],
  };
}
