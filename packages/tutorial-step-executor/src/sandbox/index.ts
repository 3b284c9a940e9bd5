/**
 * Sandboxing utilities
 *
 * The sandbox is the only place where tutorial actions touch processes and the
 * filesystem. The executor resolves and checks paths before calling into it,
 * so every path given to a sandbox method is absolute.
 */

/**
 * Result of executing a command in the sandbox
 */
export interface CommandResult {
  /** Exit code of the command; -1 when it was killed by a signal */
  exitCode: number;
  /** Standard output and standard error, interleaved in arrival order */
  output: string;
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Wall-clock duration in milliseconds */
  durationMs: number;
  /** Whether the command was killed because it exceeded its timeout */
  timedOut: boolean;
  /** Signal that terminated the command, if any */
  signal?: NodeJS.Signals;
}

export interface CommandOptions {
  /** Absolute working directory */
  cwd: string;
  /** Kill the command after this many milliseconds; 0, absent or above 2^31 - 1 disables */
  timeoutMs?: number;
  /** Environment variables added on top of the host environment */
  env?: Record<string, string>;
}

export interface WriteFileOptions {
  /** Append instead of replacing the file */
  append?: boolean;
  /** Create missing parent directories instead of failing */
  createParents?: boolean;
}

/**
 * Abstract interface for sandbox implementations
 *
 * This allows swapping the process and filesystem backend without changing
 * the executor logic.
 */
export interface Sandbox {
  /**
   * Get the root directory of the sandbox workspace
   */
  getWorkspaceRoot(): string;

  /**
   * Initialize the sandbox workspace
   * Creates the working directory and prepares the environment
   */
  initialize(): Promise<void>;

  /**
   * Execute a command through the platform shell
   *
   * Resolves once the process and everything it started in its process group
   * have exited or been killed; never leaves a process running after a timeout.
   */
  executeCommand(command: string, options: CommandOptions): Promise<CommandResult>;

  /**
   * Check if a file or directory exists
   */
  fileExists(path: string): Promise<boolean>;

  /**
   * Read file contents
   */
  readFile(path: string): Promise<string>;

  /**
   * Write or append file contents
   * @throws FilesystemError on any write failure
   */
  writeFile(path: string, contents: string, options?: WriteFileOptions): Promise<void>;

  /**
   * Add execute permission for user, group and others
   * @throws FilesystemError
   */
  makeExecutable(path: string): Promise<void>;

  /**
   * Clean up the sandbox workspace
   * @param keepWorkspace If true, don't delete the workspace (for debugging)
   */
  cleanup(keepWorkspace?: boolean): Promise<void>;
}

export * from './local.js';
export * from './pathUtils.js';
