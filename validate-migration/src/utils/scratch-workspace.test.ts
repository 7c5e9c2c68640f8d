import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { ScratchWorkspace, withScratchWorkspace } from './scratch-workspace.js';

describe('scratch-workspace', () => {
  let parentDir: string;

  beforeEach(async () => {
    parentDir = await fs.mkdtemp(path.join(os.tmpdir(), 'validate-migration-scratch-test-'));
  });

  afterEach(async () => {
    await fs.rm(parentDir, { recursive: true, force: true });
  });

  it('should create a unique directory with the prefix', () => {
    const first = ScratchWorkspace.acquire({ parentDir, prefix: 'run-' });
    const second = ScratchWorkspace.acquire({ parentDir, prefix: 'run-' });

    expect(first.path).not.toBe(second.path);
    expect(path.basename(first.path).startsWith('run-')).toBe(true);
    expect(existsSync(first.path)).toBe(true);

    first.release();
    second.release();
  });

  it('should remove the directory and its contents on release', async () => {
    const workspace = ScratchWorkspace.acquire({ parentDir });
    await fs.mkdir(workspace.resolve('git-clone-demo'));
    await fs.writeFile(path.join(workspace.resolve('git-clone-demo'), 'README.md'), 'test');

    workspace.release();

    expect(existsSync(workspace.path)).toBe(false);
    expect(workspace.isReleased()).toBe(true);
  });

  it('should allow release to be called more than once', () => {
    const workspace = ScratchWorkspace.acquire({ parentDir });

    workspace.release();

    expect(() => workspace.release()).not.toThrow();
    expect(existsSync(workspace.path)).toBe(false);
  });

  it('should register signal and exit listeners only while held', () => {
    const sigintBefore = process.listenerCount('SIGINT');
    const sigtermBefore = process.listenerCount('SIGTERM');
    const exitBefore = process.listenerCount('exit');

    const workspace = ScratchWorkspace.acquire({ parentDir });

    expect(process.listenerCount('SIGINT')).toBe(sigintBefore + 1);
    expect(process.listenerCount('SIGTERM')).toBe(sigtermBefore + 1);
    expect(process.listenerCount('exit')).toBe(exitBefore + 1);

    workspace.release();

    expect(process.listenerCount('SIGINT')).toBe(sigintBefore);
    expect(process.listenerCount('SIGTERM')).toBe(sigtermBefore);
    expect(process.listenerCount('exit')).toBe(exitBefore);
  });

  it('should clean up and exit with 130 when interrupted', () => {
    const exit = vi.fn();
    const workspace = ScratchWorkspace.acquire({ parentDir, exit });
    const listeners = process.listeners('SIGINT');
    const handler = listeners[listeners.length - 1];

    handler('SIGINT');

    expect(existsSync(workspace.path)).toBe(false);
    expect(exit).toHaveBeenCalledWith(130);
  });

  it('should clean up and exit with 143 when terminated', () => {
    const exit = vi.fn();
    const workspace = ScratchWorkspace.acquire({ parentDir, exit });
    const listeners = process.listeners('SIGTERM');
    const handler = listeners[listeners.length - 1];

    handler('SIGTERM');

    expect(existsSync(workspace.path)).toBe(false);
    expect(exit).toHaveBeenCalledWith(143);
  });

  describe('withScratchWorkspace', () => {
    it('should remove the workspace after the callback resolves', async () => {
      let seenPath = '';

      const result = await withScratchWorkspace(async (workspace) => {
        seenPath = workspace.path;
        expect(existsSync(workspace.path)).toBe(true);
        return 42;
      }, { parentDir });

      expect(result).toBe(42);
      expect(existsSync(seenPath)).toBe(false);
    });

    it('should remove the workspace when the callback throws', async () => {
      let seenPath = '';

      await expect(withScratchWorkspace(async (workspace) => {
        seenPath = workspace.path;
        throw new Error('boom');
      }, { parentDir })).rejects.toThrow('boom');

      expect(existsSync(seenPath)).toBe(false);
    });
  });
});
