import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { buildReport, writeReport } from './report.js';
import type { RepositoryReport } from './report.js';

const repository: RepositoryReport = {
  name: 'api',
  sourcePath: '/var/svn/api',
  targetPath: '/var/git/api.git',
  checkoutUrl: 'file:///var/svn/api/trunk',
  sourceRevisions: { value: 4, failed: false },
  targetCommits: { value: 0, failed: true },
  checks: [{ name: 'Commit migration', status: 'FAIL', detail: 'Git: 0 < SVN: 4' }]
};

describe('report', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'validate-migration-report-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should build a report with timestamp and roots', () => {
    const report = buildReport(
      { sourceRoot: '/var/svn', targetRoot: '/var/git' },
      [repository],
      { total: 1, passed: 0, failed: 1, warnings: 0 },
      new Date('2024-05-01T12:00:00.000Z')
    );

    expect(report).toEqual({
      timestamp: '2024-05-01T12:00:00.000Z',
      sourceRoot: '/var/svn',
      targetRoot: '/var/git',
      repositories: [repository],
      summary: { total: 1, passed: 0, failed: 1, warnings: 0 }
    });
  });

  it('should write pretty-printed JSON', async () => {
    const outputPath = path.join(tempDir, 'report.json');
    const report = buildReport(
      { sourceRoot: '/var/svn', targetRoot: '/var/git' },
      [repository],
      { total: 1, passed: 0, failed: 1, warnings: 0 },
      new Date('2024-05-01T12:00:00.000Z')
    );

    await writeReport(outputPath, report);

    const content = await fs.readFile(outputPath, 'utf-8');
    expect(content).toBe(JSON.stringify(report, null, 2) + '\n');
    expect(JSON.parse(content).repositories[0].targetCommits).toEqual({ value: 0, failed: true });
  });
});
