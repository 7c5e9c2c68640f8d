import type { CheckStatus, TotalsSnapshot } from './types.js';

/**
 * Pass/fail counters for one validation run. Owned by the run driver and
 * passed to every check runner; total always equals passed + failed.
 */
export class RunTotals {
  private totalCount = 0;
  private passedCount = 0;
  private failedCount = 0;
  private warningCount = 0;

  record(status: CheckStatus): void {
    this.totalCount++;
    if (status === 'FAIL') {
      this.failedCount++;
      return;
    }
    this.passedCount++;
    if (status === 'WARN') {
      this.warningCount++;
    }
  }

  get total(): number {
    return this.totalCount;
  }

  get passed(): number {
    return this.passedCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  get warnings(): number {
    return this.warningCount;
  }

  hasFailures(): boolean {
    return this.failedCount > 0;
  }

  snapshot(): TotalsSnapshot {
    return {
      total: this.totalCount,
      passed: this.passedCount,
      failed: this.failedCount,
      warnings: this.warningCount
    };
  }
}
