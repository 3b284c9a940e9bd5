/**
 * Shared utilities for path operations
 */

import { isAbsolute, relative, resolve, sep } from 'path';
import { PathEscapeError } from '../errors.js';

export interface PathSandboxOptions {
  /** Accept absolute paths and paths outside the root (CLI-level opt-in) */
  allowUnsafePaths?: boolean;
}

/**
 * Resolve a path relative to workspace root
 * If the path is absolute, it's returned as-is
 */
export function resolveWorkspacePath(
  path: string,
  workspaceRoot: string
): string {
  if (isAbsolute(path)) {
    return path;
  }
  return resolve(workspaceRoot, path);
}

/**
 * Whether `path` is `root` itself or lies below it
 */
export function isWithinRoot(path: string, root: string): boolean {
  const rel = relative(resolve(root), resolve(path));
  const escapes = rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
  return !escapes;
}

/**
 * Resolve a requested file path against the workspace root, refusing anything
 * that would land outside of it.
 *
 * `..` segments are fine as long as the result stays inside the root.
 *
 * @throws PathEscapeError for absolute paths or paths escaping the root,
 * unless `allowUnsafePaths` is set
 */
export function resolveSandboxedPath(
  requestedPath: string,
  workspaceRoot: string,
  options: PathSandboxOptions = {}
): string {
  if (options.allowUnsafePaths) {
    return resolveWorkspacePath(requestedPath, workspaceRoot);
  }

  if (isAbsolute(requestedPath)) {
    throw new PathEscapeError(requestedPath, workspaceRoot, 'Absolute paths are not allowed');
  }

  const resolved = resolve(workspaceRoot, requestedPath);
  if (!isWithinRoot(resolved, workspaceRoot)) {
    throw new PathEscapeError(requestedPath, workspaceRoot, 'Path escapes the working directory');
  }
  return resolved;
}
