import type { CheckResult } from './types.js';

export const COMMIT_MIGRATION_CHECK = 'Commit migration';
export const CONTENT_CHECK = 'File content verification';
export const BRANCHES_CHECK = 'Git branches';

/**
 * Result of materializing both sides of a repository pair for comparison
 */
export type ContentComparison =
  | { kind: 'compared'; targetFiles: number; sourceFiles: number }
  | { kind: 'unavailable'; reason: string };

/**
 * A migration must keep at least one commit per source revision. Branch
 * expansion may add commits, so more is fine.
 */
export function evaluateMigrationCompleteness(sourceRevisions: number, targetCommits: number): CheckResult {
  if (targetCommits >= sourceRevisions) {
    return {
      name: COMMIT_MIGRATION_CHECK,
      status: 'PASS',
      detail: `Git: ${targetCommits} >= SVN: ${sourceRevisions}`
    };
  }

  return {
    name: COMMIT_MIGRATION_CHECK,
    status: 'FAIL',
    detail: `Git: ${targetCommits} < SVN: ${sourceRevisions}`
  };
}

/**
 * FAIL only when a side could not be materialized. Differing counts are a
 * WARN since the Git tree may carry content from branches and tags.
 */
export function evaluateContentParity(comparison: ContentComparison): CheckResult {
  if (comparison.kind === 'unavailable') {
    return { name: CONTENT_CHECK, status: 'FAIL', detail: comparison.reason };
  }

  const counts = `Files in Git: ${comparison.targetFiles}, Files in SVN trunk: ${comparison.sourceFiles}`;
  if (comparison.targetFiles === comparison.sourceFiles) {
    return { name: CONTENT_CHECK, status: 'PASS', detail: counts };
  }
  return {
    name: CONTENT_CHECK,
    status: 'WARN',
    detail: `${counts} (may differ due to branches/tags)`
  };
}

/**
 * A single-line migration can legitimately have no extra branches, so an
 * empty list only warns.
 */
export function evaluateBranches(branches: string[]): CheckResult {
  if (branches.length === 0) {
    return { name: BRANCHES_CHECK, status: 'WARN', detail: '(no branches found)' };
  }
  return { name: BRANCHES_CHECK, status: 'PASS', detail: `Branches: ${branches.join(', ')}` };
}
