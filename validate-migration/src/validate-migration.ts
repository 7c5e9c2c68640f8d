import { loadConfig } from './config/config.js';
import type { ValidatorConfig } from './config/types.js';
import type { MigrationTools } from './vcs/types.js';
import type { TotalsSnapshot } from './checks/types.js';
import { createSystemTools } from './vcs/host.js';
import { RunTotals } from './checks/run-totals.js';
import { discoverRepositories, selectRepositories } from './validator/discovery.js';
import { resolveRepositoryPair } from './validator/layout.js';
import { validateRepository } from './validator/repository-validator.js';
import { ConsoleReporter } from './validator/reporter.js';
import type { ValidationReporter } from './validator/reporter.js';
import { buildReport, writeReport } from './validator/report.js';
import type { RepositoryReport } from './validator/report.js';
import { withScratchWorkspace } from './utils/scratch-workspace.js';
import type { ScratchWorkspaceOptions } from './utils/scratch-workspace.js';
import { errorMessage } from './utils/fs-utils.js';
import { logger } from './utils/logger.js';

export interface ValidateMigrationOptions {
  configPath?: string;
  /** Values taking precedence over config files */
  overrides?: Partial<ValidatorConfig>;
  /** Restrict the run to these repositories */
  repositories?: string[];
  tools?: MigrationTools;
  reporter?: ValidationReporter;
  scratch?: ScratchWorkspaceOptions;
  /** Directory searched for validate-migration.json */
  cwd?: string;
  homeDir?: string;
}

export interface ValidationOutcome {
  exitCode: 0 | 1;
  summary: TotalsSnapshot;
  repositories: RepositoryReport[];
  /** Set when the run stopped before any check */
  setupError?: string;
}

/**
 * Validates every repository under the source root against its migrated
 * Git repository and prints a report. Exit code 1 means at least one check
 * failed or the run could not start.
 */
export async function validateMigration(options: ValidateMigrationOptions = {}): Promise<ValidationOutcome> {
  const reporter = options.reporter ?? new ConsoleReporter();
  const totals = new RunTotals();

  let config: ValidatorConfig;
  let names: string[];
  try {
    config = await loadConfig({
      configPath: options.configPath,
      overrides: options.overrides,
      cwd: options.cwd,
      homeDir: options.homeDir
    });
    logger.setDebug(config.debug);
    logger.debug(`Config: ${JSON.stringify(config, null, 2)}`);

    reporter.started();
    names = selectRepositories(
      await discoverRepositories(config.sourceRoot),
      options.repositories ?? []
    );
  } catch (error) {
    const message = errorMessage(error);
    logger.error(message);
    return { exitCode: 1, summary: totals.snapshot(), repositories: [], setupError: message };
  }

  reporter.discovered(names);

  const tools = options.tools ?? createSystemTools();
  const repositories = await withScratchWorkspace(async (workspace) => {
    const reports: RepositoryReport[] = [];
    for (const name of names) {
      const pair = resolveRepositoryPair(name, config);
      reports.push(await validateRepository(pair, { config, tools, workspace, totals, reporter }));
    }
    return reports;
  }, options.scratch);

  const summary = totals.snapshot();
  reporter.finished(summary);

  if (config.reportFile) {
    logger.debug(`Writing report to: ${config.reportFile}`);
    await writeReport(config.reportFile, buildReport(config, repositories, summary));
  }

  return {
    exitCode: totals.hasFailures() ? 1 : 0,
    summary,
    repositories
  };
}
