import fs from 'fs/promises';
import type { ValidatorConfig } from '../config/types.js';
import type { CheckResult, TotalsSnapshot } from '../checks/types.js';
import type { RepositoryPair } from './layout.js';

/**
 * A count read from a repository. On query failure the value is 0 and
 * `failed` is set, so an empty repository and a failed query stay apart.
 */
export interface CountQuery {
  value: number;
  failed: boolean;
}

export interface RepositoryReport extends RepositoryPair {
  sourceRevisions: CountQuery;
  targetCommits: CountQuery;
  checks: CheckResult[];
}

export interface ValidationReport {
  timestamp: string;
  sourceRoot: string;
  targetRoot: string;
  repositories: RepositoryReport[];
  summary: TotalsSnapshot;
}

export function buildReport(
  config: Pick<ValidatorConfig, 'sourceRoot' | 'targetRoot'>,
  repositories: RepositoryReport[],
  summary: TotalsSnapshot,
  now: Date = new Date()
): ValidationReport {
  return {
    timestamp: now.toISOString(),
    sourceRoot: config.sourceRoot,
    targetRoot: config.targetRoot,
    repositories,
    summary
  };
}

/**
 * Formats the report as pretty-printed JSON
 */
export function formatJsonReport(report: ValidationReport): string {
  return JSON.stringify(report, null, 2);
}

export async function writeReport(filePath: string, report: ValidationReport): Promise<void> {
  await fs.writeFile(filePath, formatJsonReport(report) + '\n', 'utf-8');
}
