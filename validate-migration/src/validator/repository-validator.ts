import path from 'path';
import type { ValidatorConfig } from '../config/types.js';
import type { MigrationTools } from '../vcs/types.js';
import type { ScratchWorkspace } from '../utils/scratch-workspace.js';
import type { RunTotals } from '../checks/run-totals.js';
import type { ContentComparison } from '../checks/evaluations.js';
import type { ValidationReporter } from './reporter.js';
import type { RepositoryPair } from './layout.js';
import type { CountQuery, RepositoryReport } from './report.js';
import { CheckRunner } from '../checks/check-runner.js';
import {
  evaluateBranches,
  evaluateContentParity,
  evaluateMigrationCompleteness
} from '../checks/evaluations.js';
import { countFiles } from '../utils/file-scanner.js';
import { errorMessage } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';

const GIT_METADATA_DIR = '.git';
const SVN_METADATA_DIR = '.svn';

export interface RepositoryValidationContext {
  config: ValidatorConfig;
  tools: MigrationTools;
  workspace: ScratchWorkspace;
  totals: RunTotals;
  reporter: ValidationReporter;
}

/**
 * Runs every check for one repository pair, in order. Failures are counted
 * and never stop the sequence.
 */
export async function validateRepository(
  pair: RepositoryPair,
  context: RepositoryValidationContext
): Promise<RepositoryReport> {
  const { config, reporter } = context;
  const { source, target, host } = context.tools;
  const checks = new CheckRunner(context.totals, reporter);

  reporter.repositoryStarted(pair);

  await checks.run('SVN repo exists', () => host.isDirectory(pair.sourcePath));
  await checks.run('SVN repo is valid', () => source.verify(pair.sourcePath));
  await checks.run('Git repo exists', () => host.isDirectory(pair.targetPath));
  await checks.run('Git repo is valid', () => target.isRepository(pair.targetPath));

  const sourceRevisions = await queryCount('svnlook youngest', () => source.youngestRevision(pair.sourcePath));
  reporter.measurement('SVN revisions', formatCount(sourceRevisions));

  const targetCommits = await queryCount('git rev-list', () => target.countCommits(pair.targetPath));
  reporter.measurement('Git commits', formatCount(targetCommits));

  checks.record(evaluateMigrationCompleteness(sourceRevisions.value, targetCommits.value));

  const cloneDir = context.workspace.resolve(`git-clone-${pair.name}`);
  const checkoutDir = context.workspace.resolve(`svn-checkout-${pair.name}`);
  const comparison = await compareContent(pair, cloneDir, checkoutDir, context.tools);
  checks.record(evaluateContentParity(comparison));

  await checks.run(`Sample ${config.sampleFile} exists in Git`, () =>
    host.isFile(path.join(cloneDir, config.sampleFile))
  );
  await checks.run(`Sample ${config.sampleFile} exists in SVN`, () =>
    host.isFile(path.join(checkoutDir, config.sampleFile))
  );

  checks.record(evaluateBranches(await listBranches(pair, context.tools)));

  await checks.run(`Git ${config.receivePackKey} enabled`, async () =>
    (await target.getConfig(pair.targetPath, config.receivePackKey, 'bool')) === 'true'
  );

  await checks.run(`SVN owned by ${config.expectedOwner}`, async () =>
    (await host.ownerOf(pair.sourcePath)) === config.expectedOwner
  );
  await checks.run(`Git owned by ${config.expectedOwner}`, async () =>
    (await host.ownerOf(pair.targetPath)) === config.expectedOwner
  );

  reporter.repositoryFinished(pair);

  return {
    ...pair,
    sourceRevisions,
    targetCommits,
    checks: [...checks.results]
  };
}

/**
 * Reads a count, falling back to 0 when the query fails
 */
async function queryCount(description: string, query: () => Promise<number>): Promise<CountQuery> {
  try {
    return { value: await query(), failed: false };
  } catch (error) {
    logger.debug(`${description} failed: ${errorMessage(error)}`);
    return { value: 0, failed: true };
  }
}

function formatCount(count: CountQuery): string {
  return count.failed ? `${count.value} (query failed)` : String(count.value);
}

/**
 * Clones the Git repository and checks out SVN trunk, then counts files on
 * both sides. The checkout is skipped when the clone fails.
 */
async function compareContent(
  pair: RepositoryPair,
  cloneDir: string,
  checkoutDir: string,
  tools: MigrationTools
): Promise<ContentComparison> {
  try {
    if (!(await tools.target.clone(pair.targetPath, cloneDir))) {
      return { kind: 'unavailable', reason: 'git clone failed' };
    }
    if (!(await tools.source.checkout(pair.checkoutUrl, checkoutDir))) {
      return { kind: 'unavailable', reason: 'svn checkout failed' };
    }

    return {
      kind: 'compared',
      targetFiles: await countFiles(cloneDir, { excludeTopLevelDirs: [GIT_METADATA_DIR] }),
      sourceFiles: await countFiles(checkoutDir, { excludeTopLevelDirs: [SVN_METADATA_DIR] })
    };
  } catch (error) {
    return { kind: 'unavailable', reason: errorMessage(error) };
  }
}

async function listBranches(pair: RepositoryPair, tools: MigrationTools): Promise<string[]> {
  try {
    return await tools.target.listBranches(pair.targetPath);
  } catch (error) {
    logger.debug(`Listing branches of ${pair.targetPath} failed: ${errorMessage(error)}`);
    return [];
  }
}
