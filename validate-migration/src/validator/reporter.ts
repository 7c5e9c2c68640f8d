import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { CheckListener } from '../checks/check-runner.js';
import type { CheckResult, CheckStatus, TotalsSnapshot } from '../checks/types.js';
import type { RepositoryPair } from './layout.js';
import { logger } from '../utils/logger.js';

const BANNER_WIDTH = 41;
const SECTION_RULE_WIDTH = 43;

/**
 * Receives progress of a validation run
 */
export interface ValidationReporter extends CheckListener {
  started(): void;
  discovered(names: string[]): void;
  repositoryStarted(pair: RepositoryPair): void;
  measurement(label: string, value: string): void;
  repositoryFinished(pair: RepositoryPair): void;
  finished(totals: TotalsSnapshot): void;
}

export interface ConsoleReporterOptions {
  /** Line sink (defaults to the logger) */
  write?: (line: string) => void;
  colors?: ChalkInstance;
}

/**
 * Human-readable report printed as the run progresses
 */
export class ConsoleReporter implements ValidationReporter {
  private readonly write: (line: string) => void;
  private readonly colors: ChalkInstance;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => logger.info(line));
    this.colors = options.colors ?? chalk;
  }

  started(): void {
    this.banner('   SVN to Git Migration Validator');
    this.write('');
  }

  discovered(names: string[]): void {
    this.write(this.colors.green('Found repositories:'));
    for (const name of names) {
      this.write(`  - ${name}`);
    }
    this.write('');
  }

  repositoryStarted(pair: RepositoryPair): void {
    this.write(this.colors.yellow(`Validating: ${pair.name}`));
    this.write('-'.repeat(SECTION_RULE_WIDTH));
  }

  checkCompleted(result: CheckResult): void {
    this.write(`Testing: ${result.name} ... ${this.formatStatus(result.status)}`);
    if (result.detail) {
      this.write(`  ${result.detail}`);
    }
  }

  measurement(label: string, value: string): void {
    this.write(`  ${label}: ${this.colors.blue(value)}`);
  }

  repositoryFinished(): void {
    this.write('');
  }

  finished(totals: TotalsSnapshot): void {
    this.banner('           Validation Summary');
    this.write('');
    this.write(`Total tests: ${this.colors.blue(String(totals.total))}`);
    this.write(`Passed:      ${this.colors.green(String(totals.passed))}`);
    this.write(`Failed:      ${this.colors.red(String(totals.failed))}`);
    if (totals.warnings > 0) {
      this.write(`Warnings:    ${this.colors.yellow(String(totals.warnings))}`);
    }
    this.write('');

    if (totals.failed === 0) {
      this.write(this.colors.green('✓ All validations passed!'));
      this.write(this.colors.green('Migration appears to be successful.'));
    } else {
      this.write(this.colors.yellow('⚠ Some validations failed.'));
      this.write(this.colors.yellow('Please review the output above.'));
    }
  }

  private banner(title: string): void {
    const rule = this.colors.blue('='.repeat(BANNER_WIDTH));
    this.write(rule);
    this.write(this.colors.blue(title));
    this.write(rule);
  }

  private formatStatus(status: CheckStatus): string {
    switch (status) {
      case 'PASS':
        return this.colors.green(status);
      case 'WARN':
        return this.colors.yellow(status);
      case 'FAIL':
        return this.colors.red(status);
    }
  }
}
