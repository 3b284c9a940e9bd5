import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { basename, dirname, join } from 'path';
import { tmpdir } from 'os';
import { LocalSandbox } from '../../src/sandbox/local.js';
import { FilesystemError } from '../../src/errors.js';

describe('Integration: LocalSandbox', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'docdrift-sandbox-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('should create and remove a temporary workspace', async () => {
    const sandbox = new LocalSandbox({ baseDir, tutorialId: 'my tutorial' });
    const root = sandbox.getWorkspaceRoot();
    expect(dirname(root)).toBe(baseDir);
    expect(basename(root).startsWith('docdrift-my-tutorial-')).toBe(true);

    await sandbox.initialize();
    expect(existsSync(root)).toBe(true);

    await sandbox.cleanup();
    expect(existsSync(root)).toBe(false);
  });

  it('should keep the workspace when asked', async () => {
    const sandbox = new LocalSandbox({ baseDir });
    await sandbox.initialize();
    await sandbox.cleanup(true);
    expect(existsSync(sandbox.getWorkspaceRoot())).toBe(true);
  });

  it('should never delete a workspace it was given', async () => {
    const sandbox = new LocalSandbox({ workspaceRoot: baseDir });
    await sandbox.initialize();
    await sandbox.cleanup();
    expect(existsSync(baseDir)).toBe(true);
  });

  it('should separate and combine stdout and stderr', async () => {
    const sandbox = new LocalSandbox({ workspaceRoot: baseDir });
    const result = await sandbox.executeCommand('echo out; sleep 0.2; echo err 1>&2; exit 4', { cwd: baseDir });

    expect(result).toMatchObject({
      exitCode: 4,
      stdout: 'out\n',
      stderr: 'err\n',
      output: 'out\nerr\n',
      timedOut: false,
    });
  });

  it('should run without a timeout when timeoutMs is 0', async () => {
    const sandbox = new LocalSandbox({ workspaceRoot: baseDir });
    const result = await sandbox.executeCommand('sleep 0.2; echo done', { cwd: baseDir, timeoutMs: 0 });
    expect(result.timedOut).toBe(false);
    expect(result.stdout).toBe('done\n');
  });

  it('should run without a timeout when timeoutMs is beyond the timer range', async () => {
    const sandbox = new LocalSandbox({ workspaceRoot: baseDir });
    const result = await sandbox.executeCommand('sleep 0.2; echo done', { cwd: baseDir, timeoutMs: 3_000_000_000 });
    expect(result.timedOut).toBe(false);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('done\n');
  });

  it('should report a timeout', async () => {
    const sandbox = new LocalSandbox({ workspaceRoot: baseDir });
    const result = await sandbox.executeCommand('sleep 5', { cwd: baseDir, timeoutMs: 200 });
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(-1);
    expect(result.signal).toBe('SIGKILL');
  });

  it('should write, append and read files', async () => {
    const sandbox = new LocalSandbox({ workspaceRoot: baseDir });
    const path = join(baseDir, 'notes.txt');
    await sandbox.writeFile(path, 'a\n');
    await sandbox.writeFile(path, 'b\n', { append: true });
    expect(await sandbox.readFile(path)).toBe('a\nb\n');
    expect(await readFile(path, 'utf-8')).toBe('a\nb\n');
  });

  it('should raise FilesystemError for a missing parent directory', async () => {
    const sandbox = new LocalSandbox({ workspaceRoot: baseDir });
    const path = join(baseDir, 'missing', 'f.txt');
    await expect(sandbox.writeFile(path, 'x')).rejects.toThrow(FilesystemError);
    await expect(sandbox.writeFile(path, 'x')).rejects.toThrow(
      `Parent directory does not exist: ${join(baseDir, 'missing')}`
    );
  });
});
