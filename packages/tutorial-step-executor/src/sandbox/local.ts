/**
 * Local sandbox implementation
 *
 * Executes tutorial actions on the local machine. Uses either a directory
 * supplied by the caller or a fresh temporary directory as the workspace.
 */

import { promises as fs } from 'fs';
import { resolve, dirname } from 'path';
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { randomUUID } from 'crypto';
import { tmpdir } from 'os';
import type { Sandbox, CommandOptions, CommandResult, WriteFileOptions } from './index.js';
import { FilesystemError, errnoCode } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

/** Longest delay setTimeout accepts */
const MAX_TIMER_MS = 2 ** 31 - 1;

export interface LocalSandboxOptions {
  /**
   * Run in this existing directory instead of a temporary one.
   * A caller-supplied workspace is never deleted by `cleanup()`.
   */
  workspaceRoot?: string;
  /** Parent directory for temporary workspaces (default: the OS temp dir) */
  baseDir?: string;
  /** Used to name the temporary workspace */
  tutorialId?: string;
  logger?: Logger;
}

/**
 * Local sandbox that executes commands directly on the host machine
 */
export class LocalSandbox implements Sandbox {
  private workspaceRoot: string;
  private ownsWorkspace: boolean;
  private logger: Logger;

  constructor(options: LocalSandboxOptions = {}) {
    this.logger = options.logger ?? silentLogger;

    if (options.workspaceRoot) {
      this.workspaceRoot = resolve(options.workspaceRoot);
      this.ownsWorkspace = false;
    } else {
      // Use tutorial ID or generate a UUID
      const tutorialId = options.tutorialId
        ? options.tutorialId.replace(/[^A-Za-z0-9_-]+/g, '-')
        : randomUUID();
      const timestamp = Date.now();
      this.workspaceRoot = resolve(options.baseDir ?? tmpdir(), `docdrift-${tutorialId}-${timestamp}`);
      this.ownsWorkspace = true;
    }
  }

  getWorkspaceRoot(): string {
    return this.workspaceRoot;
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.workspaceRoot, { recursive: true });
  }

  executeCommand(command: string, options: CommandOptions): Promise<CommandResult> {
    const startedAt = Date.now();

    return new Promise<CommandResult>((resolveResult, reject) => {
      const child = spawn(command, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        shell: true,
        // Own process group, so a timeout can kill everything the command started
        detached: process.platform !== 'win32',
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let output = '';
      let timedOut = false;
      let settled = false;

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
        output += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
        output += chunk;
      });

      // Longer delays would fire at once; they run without a timeout
      const timer = options.timeoutMs && options.timeoutMs <= MAX_TIMER_MS
        ? setTimeout(() => {
            timedOut = true;
            this.logger.debug(`Timeout after ${options.timeoutMs}ms, killing process group ${child.pid}`);
            killProcessGroup(child);
          }, options.timeoutMs)
        : undefined;

      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        killProcessGroup(child);
        reject(error);
      });

      // 'close' fires after the process exited and its output streams drained
      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolveResult({
          exitCode: code ?? -1,
          output,
          stdout,
          stderr,
          durationMs: Date.now() - startedAt,
          timedOut,
          signal: signal ?? undefined,
        });
      });
    });
  }

  async fileExists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async readFile(path: string): Promise<string> {
    return await fs.readFile(path, 'utf-8');
  }

  async writeFile(path: string, contents: string, options: WriteFileOptions = {}): Promise<void> {
    try {
      if (options.createParents) {
        await fs.mkdir(dirname(path), { recursive: true });
      }
      if (options.append) {
        await fs.appendFile(path, contents, 'utf-8');
      } else {
        await fs.writeFile(path, contents, 'utf-8');
      }
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new FilesystemError(path, `Parent directory does not exist: ${dirname(path)}`, 'ENOENT');
      }
      throw FilesystemError.fromNodeError(path, error);
    }
  }

  async makeExecutable(path: string): Promise<void> {
    try {
      const { mode } = await fs.stat(path);
      await fs.chmod(path, mode | 0o111);
    } catch (error) {
      throw FilesystemError.fromNodeError(path, error);
    }
  }

  async cleanup(keepWorkspace?: boolean): Promise<void> {
    if (!this.ownsWorkspace) {
      return;
    }
    if (keepWorkspace) {
      this.logger.info(`Workspace preserved at: ${this.workspaceRoot}`);
      return;
    }
    try {
      await fs.rm(this.workspaceRoot, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Failed to cleanup workspace: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/**
 * SIGKILL the child's whole process group, falling back to the child alone
 */
function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch (error) {
    // ESRCH: the group is already gone
    if (errnoCode(error) !== 'ESRCH') {
      child.kill('SIGKILL');
    }
  }
}
