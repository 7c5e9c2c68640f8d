import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { logger } from './logger.js';

const DEFAULT_PREFIX = 'validate-migration-';

/** Exit codes used when a signal interrupts the run */
const SIGNAL_EXIT_CODES: Record<'SIGINT' | 'SIGTERM', number> = {
  SIGINT: 130,
  SIGTERM: 143
};

export interface ScratchWorkspaceOptions {
  /** Directory the workspace is created in (defaults to the OS temp dir) */
  parentDir?: string;
  prefix?: string;
  /** Called after cleanup when a signal interrupts the run */
  exit?: (code: number) => void;
}

/**
 * A uniquely named temporary directory that is removed when the scope ends,
 * when the process exits, or when SIGINT/SIGTERM arrives.
 */
export class ScratchWorkspace {
  readonly path: string;
  private released = false;
  private readonly exit: (code: number) => void;

  private readonly onExit = (): void => {
    this.release();
  };

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.release();
    this.exit(signal === 'SIGTERM' ? SIGNAL_EXIT_CODES.SIGTERM : SIGNAL_EXIT_CODES.SIGINT);
  };

  private constructor(dirPath: string, exit: (code: number) => void) {
    this.path = dirPath;
    this.exit = exit;
  }

  static acquire(options: ScratchWorkspaceOptions = {}): ScratchWorkspace {
    const parentDir = options.parentDir ?? os.tmpdir();
    const dirPath = fs.mkdtempSync(path.join(parentDir, options.prefix ?? DEFAULT_PREFIX));
    const workspace = new ScratchWorkspace(dirPath, options.exit ?? ((code) => process.exit(code)));

    process.once('exit', workspace.onExit);
    process.once('SIGINT', workspace.onSignal);
    process.once('SIGTERM', workspace.onSignal);
    logger.debug(`Created scratch workspace: ${dirPath}`);

    return workspace;
  }

  /** Subdirectory path inside the workspace (not created) */
  resolve(name: string): string {
    return path.join(this.path, name);
  }

  isReleased(): boolean {
    return this.released;
  }

  /**
   * Removes the workspace and its listeners. Safe to call more than once.
   * Synchronous so it can run from the process 'exit' event.
   */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;

    process.removeListener('exit', this.onExit);
    process.removeListener('SIGINT', this.onSignal);
    process.removeListener('SIGTERM', this.onSignal);

    fs.rmSync(this.path, { recursive: true, force: true });
    logger.debug(`Removed scratch workspace: ${this.path}`);
  }
}

/**
 * Runs `fn` with a fresh scratch workspace and removes it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withScratchWorkspace<T>(
  fn: (workspace: ScratchWorkspace) => Promise<T>,
  options: ScratchWorkspaceOptions = {}
): Promise<T> {
  const workspace = ScratchWorkspace.acquire(options);
  try {
    return await fn(workspace);
  } finally {
    workspace.release();
  }
}
