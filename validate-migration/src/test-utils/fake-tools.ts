import fs from 'fs/promises';
import path from 'path';
import type { HostInspector, MigrationTools, SourceVcs, TargetVcs } from '../vcs/types.js';
import { isFile } from '../utils/fs-utils.js';

/**
 * State of one SVN/Git repository pair as the fake tools report it
 */
export interface FakeRepository {
  sourceExists: boolean;
  sourceValid: boolean;
  targetExists: boolean;
  targetValid: boolean;
  /** A string makes the query fail with that message */
  sourceRevisions: number | string;
  targetCommits: number | string;
  /** Files written by a successful clone; null makes the clone fail */
  cloneFiles: string[] | null;
  /** Files written by a successful checkout; null makes the checkout fail */
  checkoutFiles: string[] | null;
  branches: string[];
  receivePack: string | null;
  sourceOwner: string;
  targetOwner: string;
}

export function fileNames(count: number, first = 'README.md'): string[] {
  const names = [first];
  for (let i = 1; i < count; i++) {
    names.push(`src/file${i}.txt`);
  }
  return names;
}

/**
 * A migrated repository that passes every check: 10 revisions, 12 commits,
 * 5 files on both sides
 */
export function healthyRepository(overrides: Partial<FakeRepository> = {}): FakeRepository {
  return {
    sourceExists: true,
    sourceValid: true,
    targetExists: true,
    targetValid: true,
    sourceRevisions: 10,
    targetCommits: 12,
    cloneFiles: fileNames(5),
    checkoutFiles: fileNames(5),
    branches: ['main'],
    receivePack: 'true',
    sourceOwner: 'www-data',
    targetOwner: 'www-data',
    ...overrides
  };
}

async function writeTree(destination: string, metadataDir: string, files: string[]): Promise<void> {
  await fs.mkdir(path.join(destination, metadataDir), { recursive: true });
  await fs.writeFile(path.join(destination, metadataDir, 'meta'), 'metadata');
  for (const file of files) {
    await fs.mkdir(path.dirname(path.join(destination, file)), { recursive: true });
    await fs.writeFile(path.join(destination, file), 'content');
  }
}

function countOrThrow(value: number | string): number {
  if (typeof value === 'string') {
    throw new Error(value);
  }
  return value;
}

/**
 * In-process stand-in for svn, git and stat. Repositories are looked up by
 * their source path, target path or checkout URL.
 */
export class FakeTools implements MigrationTools {
  readonly calls: string[] = [];
  private readonly bySource = new Map<string, FakeRepository>();
  private readonly byTarget = new Map<string, FakeRepository>();
  private readonly byUrl = new Map<string, FakeRepository>();

  constructor(pairs: Array<{ sourcePath: string; targetPath: string; checkoutUrl: string; repository: FakeRepository }>) {
    for (const pair of pairs) {
      this.bySource.set(pair.sourcePath, pair.repository);
      this.byTarget.set(pair.targetPath, pair.repository);
      this.byUrl.set(pair.checkoutUrl, pair.repository);
    }
  }

  private lookup(map: Map<string, FakeRepository>, key: string): FakeRepository {
    const repository = map.get(key);
    if (!repository) {
      throw new Error(`No such repository: ${key}`);
    }
    return repository;
  }

  readonly source: SourceVcs = {
    verify: async (repoPath) => {
      this.calls.push(`verify ${repoPath}`);
      return this.lookup(this.bySource, repoPath).sourceValid;
    },
    youngestRevision: async (repoPath) => {
      this.calls.push(`youngest ${repoPath}`);
      return countOrThrow(this.lookup(this.bySource, repoPath).sourceRevisions);
    },
    checkout: async (url, destination) => {
      this.calls.push(`checkout ${url}`);
      const files = this.lookup(this.byUrl, url).checkoutFiles;
      if (!files) return false;
      await writeTree(destination, '.svn', files);
      return true;
    }
  };

  readonly target: TargetVcs = {
    isRepository: async (repoPath) => {
      this.calls.push(`rev-parse ${repoPath}`);
      return this.lookup(this.byTarget, repoPath).targetValid;
    },
    countCommits: async (repoPath) => {
      this.calls.push(`rev-list ${repoPath}`);
      return countOrThrow(this.lookup(this.byTarget, repoPath).targetCommits);
    },
    clone: async (repoPath, destination) => {
      this.calls.push(`clone ${repoPath}`);
      const files = this.lookup(this.byTarget, repoPath).cloneFiles;
      if (!files) return false;
      await writeTree(destination, '.git', files);
      return true;
    },
    listBranches: async (repoPath) => {
      this.calls.push(`for-each-ref ${repoPath}`);
      return this.lookup(this.byTarget, repoPath).branches;
    },
    getConfig: async (repoPath, key) => {
      this.calls.push(`config ${key} ${repoPath}`);
      return this.lookup(this.byTarget, repoPath).receivePack;
    }
  };

  readonly host: HostInspector = {
    isDirectory: async (dirPath) => {
      const source = this.bySource.get(dirPath);
      if (source) return source.sourceExists;
      const target = this.byTarget.get(dirPath);
      if (target) return target.targetExists;
      return false;
    },
    isFile: (filePath) => isFile(filePath),
    ownerOf: async (ownedPath) => {
      const source = this.bySource.get(ownedPath);
      if (source) return source.sourceOwner;
      return this.lookup(this.byTarget, ownedPath).targetOwner;
    }
  };
}
