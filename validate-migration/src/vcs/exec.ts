import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/fs-utils.js';

const execFileAsync = promisify(execFile);

const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

export interface RunOptions {
  cwd?: string;
}

/**
 * Exit code of a failed child process, or null if it never ran
 */
export function exitCodeOf(error: unknown): number | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

/**
 * Execute an external command and return its trimmed stdout.
 * Rejects when the command cannot start or exits non-zero.
 */
export async function runCommand(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<string> {
  const description = `${command} ${args.join(' ')}`;
  logger.debug(`Executing: ${description}${options.cwd ? ` (in ${options.cwd})` : ''}`);

  const { stdout, stderr } = await execFileAsync(command, args, {
    cwd: options.cwd,
    encoding: 'utf8',
    maxBuffer: MAX_BUFFER_BYTES
  });

  if (stderr) {
    logger.debug(`${command} stderr: ${stderr.trim()}`);
  }

  return stdout.trim();
}

/**
 * Execute an external command and report whether it exited successfully.
 * Output is discarded.
 */
export async function commandSucceeds(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<boolean> {
  try {
    await runCommand(command, args, options);
    return true;
  } catch (error) {
    logger.debug(`${command} ${args.join(' ')} failed: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Parse a non-negative integer printed by a command
 * @throws Error if the output is not a plain integer
 */
export function parseCount(output: string, description: string): number {
  const trimmed = output.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Unexpected output from ${description}: "${trimmed}"`);
  }
  return parseInt(trimmed, 10);
}
