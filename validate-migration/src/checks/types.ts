/**
 * Outcome of a single check. WARN counts as passed but is flagged for review.
 */
export type CheckStatus = 'PASS' | 'FAIL' | 'WARN';

export interface CheckResult {
  name: string;
  status: CheckStatus;
  /** Shown to the operator under the status line */
  detail?: string;
  /** Message of the error that made the check fail, kept for the report only */
  error?: string;
}

/** Async predicate evaluated by a check; a rejection counts as failure */
export type CheckAction = () => Promise<boolean>;

export interface TotalsSnapshot {
  total: number;
  passed: number;
  failed: number;
  /** Subset of passed that were WARN */
  warnings: number;
}
