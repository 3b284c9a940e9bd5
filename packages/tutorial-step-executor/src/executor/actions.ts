/**
 * Execution of single actions
 *
 * Each function takes the shared execution context by reference: the variable
 * store in it is global to the run, so a capture made here is visible to every
 * later action, including those of later steps.
 */

import type { Action, FileAction, RunAction } from '../dsl/index.js';
import type { CommandResult, Sandbox } from '../sandbox/index.js';
import { resolveSandboxedPath, resolveWorkspacePath } from '../sandbox/pathUtils.js';
import { findReferences, substitute } from '../variables/index.js';
import type { VariableStore } from '../variables/index.js';
import { validateResult } from '../validator/index.js';
import { FilesystemError, PathEscapeError } from '../errors.js';
import type { Logger } from '../logger.js';

/**
 * Terminal state of an action
 */
export type ActionStatus = 'passed' | 'failed' | 'skipped' | 'errored';

/**
 * Why an action did not pass
 */
export type OutcomeReason =
  | 'validation-mismatch'
  | 'timeout'
  | 'path-escape'
  | 'filesystem'
  | 'spawn-error'
  | 'already-exists'
  | 'halted';

/**
 * What running one action produced
 */
export interface ActionResult {
  status: ActionStatus;
  reason?: OutcomeReason;
  message: string;
  /** Expected value, for run actions that reached validation */
  expected?: string;
  /** Actual exit code or output, for run actions that reached validation */
  actual?: string;
  /** Command after substitution */
  command?: string;
  /** Resolved file path, for file actions */
  path?: string;
  result?: CommandResult;
}

/**
 * State shared by all actions of one run
 */
export interface ExecutionContext {
  readonly sandbox: Sandbox;
  readonly variables: VariableStore;
  readonly workspaceRoot: string;
  readonly allowUnsafePaths: boolean;
  readonly createParentDirs: boolean;
  /** Extra environment for commands */
  readonly env: Record<string, string>;
  readonly logger: Logger;
}

/**
 * Run one action of any kind
 */
export async function runAction(action: Action, context: ExecutionContext): Promise<ActionResult> {
  switch (action.kind) {
    case 'run':
      return await runCommandAction(action, context);
    case 'file':
      return await runFileAction(action, context);
    default: {
      const unknown: never = action;
      throw new Error(`Unknown action kind: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Substitute, spawn, validate and capture
 */
export async function runCommandAction(action: RunAction, context: ExecutionContext): Promise<ActionResult> {
  const { sandbox, variables, logger } = context;

  const unset = findReferences(action.command).filter((name) => !variables.has(name));
  if (unset.length > 0) {
    logger.debug(`Unset variables substituted with "": ${unset.join(', ')}`);
  }
  const command = substitute(action.command, variables);

  const cwd = action.workingDirectory
    ? resolveWorkspacePath(action.workingDirectory, context.workspaceRoot)
    : context.workspaceRoot;
  if (!(await sandbox.fileExists(cwd))) {
    return {
      status: 'errored',
      reason: 'filesystem',
      message: `Working directory does not exist: ${cwd}`,
      command,
    };
  }

  logger.debug(`Running in ${cwd}: ${command}`);

  let result: CommandResult;
  try {
    result = await sandbox.executeCommand(command, {
      cwd,
      timeoutMs: action.timeoutSeconds * 1000,
      env: context.env,
    });
  } catch (error) {
    return {
      status: 'errored',
      reason: 'spawn-error',
      message: `Failed to start command: ${error instanceof Error ? error.message : String(error)}`,
      command,
    };
  }

  logger.debug(`Exit code ${result.exitCode} after ${result.durationMs}ms`);

  if (result.timedOut) {
    return {
      status: 'errored',
      reason: 'timeout',
      message: `Command timed out after ${action.timeoutSeconds} seconds`,
      command,
      result,
    };
  }

  const validation = validateResult(result, action.mode, action.expected);
  const compared = { expected: validation.expected, actual: validation.actual, command, result };
  if (!validation.passed) {
    return { status: 'failed', reason: 'validation-mismatch', message: validation.message, ...compared };
  }

  if (action.outVar) {
    variables.set(action.outVar, result.output.trim());
    logger.debug(`Captured output into ${action.outVar}`);
  }
  if (action.codeVar) {
    variables.set(action.codeVar, String(result.exitCode));
    logger.debug(`Captured exit code ${result.exitCode} into ${action.codeVar}`);
  }
  if (action.outFile) {
    try {
      const target = resolveSandboxedPath(action.outFile, context.workspaceRoot, {
        allowUnsafePaths: context.allowUnsafePaths,
      });
      await sandbox.writeFile(target, result.stdout, { createParents: context.createParentDirs });
      logger.debug(`Wrote stdout to ${target}`);
    } catch (error) {
      return { ...erroredResult(error, `Failed to write output file ${action.outFile}`), ...compared };
    }
  }

  return { status: 'passed', message: validation.message, ...compared };
}

/**
 * Materialize a file: sandbox the path, honour `once`, substitute, write, chmod
 */
export async function runFileAction(action: FileAction, context: ExecutionContext): Promise<ActionResult> {
  const { sandbox, variables, logger } = context;

  let target: string;
  try {
    target = resolveSandboxedPath(action.path, context.workspaceRoot, {
      allowUnsafePaths: context.allowUnsafePaths,
    });
  } catch (error) {
    return erroredResult(error, `Cannot write ${action.path}`);
  }

  if (action.once && (await sandbox.fileExists(target))) {
    return {
      status: 'skipped',
      reason: 'already-exists',
      message: `File already exists, skipping (once=true): ${action.path}`,
      path: target,
    };
  }

  let content = action.template === 'shell' ? substitute(action.content, variables) : action.content;
  if (!content.endsWith('\n')) {
    content += '\n';
  }

  try {
    await sandbox.writeFile(target, content, {
      append: action.writeMode === 'append',
      createParents: context.createParentDirs,
    });
    if (action.executable) {
      await sandbox.makeExecutable(target);
    }
  } catch (error) {
    return { ...erroredResult(error, `Failed to write ${action.path}`), path: target };
  }

  const verb = action.writeMode === 'append' ? 'Appended' : 'Wrote';
  const size = Buffer.byteLength(content, 'utf-8');
  logger.debug(`${verb} ${size} bytes to ${target}${action.executable ? ' (executable)' : ''}`);

  return {
    status: 'passed',
    message: `${verb} ${size} bytes to ${action.path}`,
    path: target,
  };
}

/**
 * Map a sandbox or filesystem error onto an errored result; anything else is
 * a bug and is rethrown.
 */
function erroredResult(error: unknown, context: string): ActionResult {
  if (error instanceof PathEscapeError) {
    return { status: 'errored', reason: 'path-escape', message: `${context}: ${error.message}` };
  }
  if (error instanceof FilesystemError) {
    return { status: 'errored', reason: 'filesystem', message: `${context}: ${error.message}` };
  }
  throw error;
}
