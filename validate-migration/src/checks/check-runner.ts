import type { CheckAction, CheckResult } from './types.js';
import type { RunTotals } from './run-totals.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/fs-utils.js';

/**
 * Receives each completed check as soon as it is counted
 */
export interface CheckListener {
  checkCompleted(result: CheckResult): void;
}

/**
 * Runs the checks of one repository, counting each outcome into the
 * run-wide totals and keeping the results for the report.
 */
export class CheckRunner {
  private readonly completed: CheckResult[] = [];

  constructor(
    private readonly totals: RunTotals,
    private readonly listener: CheckListener
  ) {}

  get results(): readonly CheckResult[] {
    return this.completed;
  }

  /**
   * Evaluate a predicate check: true is PASS, false or a rejection is FAIL
   */
  async run(name: string, action: CheckAction): Promise<CheckResult> {
    let result: CheckResult;

    try {
      result = { name, status: (await action()) ? 'PASS' : 'FAIL' };
    } catch (error) {
      const message = errorMessage(error);
      logger.debug(`Check "${name}" failed: ${message}`);
      result = { name, status: 'FAIL', error: message };
    }

    return this.record(result);
  }

  /**
   * Count a result that was evaluated by the caller
   */
  record(result: CheckResult): CheckResult {
    this.totals.record(result.status);
    this.completed.push(result);
    this.listener.checkCompleted(result);
    return result;
  }
}
