import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { Chalk } from 'chalk';
import { validateRepository } from './repository-validator.js';
import { resolveRepositoryPair } from './layout.js';
import { ConsoleReporter } from './reporter.js';
import { RunTotals } from '../checks/run-totals.js';
import { ScratchWorkspace } from '../utils/scratch-workspace.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { FakeTools, fileNames, healthyRepository } from '../test-utils/fake-tools.js';
import type { FakeRepository } from '../test-utils/fake-tools.js';

const config = { ...DEFAULT_CONFIG };
const pair = resolveRepositoryPair('demo', config);

describe('validateRepository', () => {
  let parentDir: string;
  let workspace: ScratchWorkspace;
  let lines: string[];
  let totals: RunTotals;

  beforeEach(async () => {
    parentDir = await fs.mkdtemp(path.join(os.tmpdir(), 'validate-migration-repo-test-'));
    workspace = ScratchWorkspace.acquire({ parentDir });
    lines = [];
    totals = new RunTotals();
  });

  afterEach(async () => {
    workspace.release();
    await fs.rm(parentDir, { recursive: true, force: true });
  });

  async function validate(repository: FakeRepository) {
    const tools = new FakeTools([{ ...pair, repository }]);
    const reporter = new ConsoleReporter({ write: (line) => lines.push(line), colors: new Chalk({ level: 0 }) });
    const report = await validateRepository(pair, { config, tools, workspace, totals, reporter });
    const statuses = Object.fromEntries(report.checks.map(check => [check.name, check.status]));
    return { tools, report, statuses };
  }

  it('should pass every check for a complete migration', async () => {
    const { report, statuses } = await validate(healthyRepository());

    expect(statuses).toEqual({
      'SVN repo exists': 'PASS',
      'SVN repo is valid': 'PASS',
      'Git repo exists': 'PASS',
      'Git repo is valid': 'PASS',
      'Commit migration': 'PASS',
      'File content verification': 'PASS',
      'Sample README.md exists in Git': 'PASS',
      'Sample README.md exists in SVN': 'PASS',
      'Git branches': 'PASS',
      'Git http.receivepack enabled': 'PASS',
      'SVN owned by www-data': 'PASS',
      'Git owned by www-data': 'PASS'
    });
    expect(report.sourceRevisions).toEqual({ value: 10, failed: false });
    expect(report.targetCommits).toEqual({ value: 12, failed: false });
    expect(totals.snapshot()).toEqual({ total: 12, passed: 12, failed: 0, warnings: 0 });
  });

  it('should run checks in order and print them', async () => {
    await validate(healthyRepository());

    expect(lines).toEqual([
      'Validating: demo',
      '-------------------------------------------',
      'Testing: SVN repo exists ... PASS',
      'Testing: SVN repo is valid ... PASS',
      'Testing: Git repo exists ... PASS',
      'Testing: Git repo is valid ... PASS',
      '  SVN revisions: 10',
      '  Git commits: 12',
      'Testing: Commit migration ... PASS',
      '  Git: 12 >= SVN: 10',
      'Testing: File content verification ... PASS',
      '  Files in Git: 5, Files in SVN trunk: 5',
      'Testing: Sample README.md exists in Git ... PASS',
      'Testing: Sample README.md exists in SVN ... PASS',
      'Testing: Git branches ... PASS',
      '  Branches: main',
      'Testing: Git http.receivepack enabled ... PASS',
      'Testing: SVN owned by www-data ... PASS',
      'Testing: Git owned by www-data ... PASS',
      ''
    ]);
  });

  it('should fail commit migration when Git has fewer commits and keep going', async () => {
    const { report, statuses } = await validate(healthyRepository({ targetCommits: 8 }));

    expect(statuses['Commit migration']).toBe('FAIL');
    expect(report.checks).toHaveLength(12);
    expect(report.checks.filter(check => check.status !== 'PASS').map(check => check.name)).toEqual([
      'Commit migration'
    ]);
    expect(totals.snapshot()).toEqual({ total: 12, passed: 11, failed: 1, warnings: 0 });
  });

  it('should fail content and SVN sample checks when the checkout fails', async () => {
    const { report, statuses } = await validate(healthyRepository({ checkoutFiles: null }));

    expect(statuses['File content verification']).toBe('FAIL');
    expect(report.checks.find(check => check.name === 'File content verification')?.detail).toBe('svn checkout failed');
    expect(statuses['Sample README.md exists in Git']).toBe('PASS');
    expect(statuses['Sample README.md exists in SVN']).toBe('FAIL');
    expect(totals.failed).toBe(2);
  });

  it('should skip the checkout when the clone fails', async () => {
    const { tools, statuses } = await validate(healthyRepository({ cloneFiles: null }));

    expect(statuses['File content verification']).toBe('FAIL');
    expect(statuses['Sample README.md exists in Git']).toBe('FAIL');
    expect(statuses['Sample README.md exists in SVN']).toBe('FAIL');
    expect(tools.calls.some(call => call.startsWith('checkout'))).toBe(false);
  });

  it('should warn when file counts differ', async () => {
    const { report, statuses } = await validate(healthyRepository({ checkoutFiles: fileNames(7) }));

    expect(statuses['File content verification']).toBe('WARN');
    expect(report.checks.find(check => check.name === 'File content verification')?.detail).toBe(
      'Files in Git: 5, Files in SVN trunk: 7 (may differ due to branches/tags)'
    );
    expect(totals.snapshot()).toEqual({ total: 12, passed: 12, failed: 0, warnings: 1 });
  });

  it('should warn when there are no branches', async () => {
    const { statuses } = await validate(healthyRepository({ branches: [] }));

    expect(statuses['Git branches']).toBe('WARN');
    expect(totals.failed).toBe(0);
  });

  it('should treat failed count queries as zero and flag them', async () => {
    const { report, statuses } = await validate(
      healthyRepository({ sourceRevisions: 'E160013: path not found', targetCommits: 'fatal: bad repo' })
    );

    expect(report.sourceRevisions).toEqual({ value: 0, failed: true });
    expect(report.targetCommits).toEqual({ value: 0, failed: true });
    expect(statuses['Commit migration']).toBe('PASS');
    expect(lines).toContain('  SVN revisions: 0 (query failed)');
    expect(lines).toContain('  Git commits: 0 (query failed)');
  });

  it('should fail receive-pack check when unset or disabled', async () => {
    const unset = await validate(healthyRepository({ receivePack: null }));
    expect(unset.statuses['Git http.receivepack enabled']).toBe('FAIL');

    const disabled = await validate(healthyRepository({ receivePack: 'false' }));
    expect(disabled.statuses['Git http.receivepack enabled']).toBe('FAIL');
  });

  it('should check ownership of each side independently', async () => {
    const { statuses } = await validate(healthyRepository({ targetOwner: 'root' }));

    expect(statuses['SVN owned by www-data']).toBe('PASS');
    expect(statuses['Git owned by www-data']).toBe('FAIL');
  });

  it('should fail existence and validity checks for a missing target', async () => {
    const { statuses } = await validate(
      healthyRepository({ targetExists: false, targetValid: false, targetCommits: 'no repo', cloneFiles: null })
    );

    expect(statuses['Git repo exists']).toBe('FAIL');
    expect(statuses['Git repo is valid']).toBe('FAIL');
    expect(statuses['Commit migration']).toBe('FAIL');
    expect(statuses['SVN repo exists']).toBe('PASS');
  });
});
