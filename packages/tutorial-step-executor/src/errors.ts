/**
 * Error types raised by the engine
 *
 * Parse-time errors are thrown and abort the whole run before anything executes.
 * Execution-time errors are caught by the executor and recorded on the
 * outcome of the action that raised them.
 */

/**
 * Base class for all errors raised by docdrift
 */
export class DocdriftError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An annotation like `{.run mode=exit}` could not be tokenized
 */
export class MalformedAttributesError extends DocdriftError {
  /** 0-based offset into the annotation text where the problem was found */
  readonly column: number;

  constructor(message: string, column: number) {
    super(message);
    this.column = column;
  }
}

export type DocumentParseErrorKind =
  | 'malformed-attributes'
  | 'invalid-attribute'
  | 'orphan-action'
  | 'duplicate-step-id'
  | 'conflicting-markers';

/**
 * The tutorial document was rejected
 */
export class DocumentParseError extends DocdriftError {
  /** 1-based line of the offending heading or code fence */
  readonly line: number;
  readonly kind: DocumentParseErrorKind;

  constructor(kind: DocumentParseErrorKind, line: number, detail: string) {
    super(`Line ${line}: ${detail}`);
    this.kind = kind;
    this.line = line;
  }
}

/**
 * A file path resolved outside the working-directory root
 */
export class PathEscapeError extends DocdriftError {
  readonly requestedPath: string;
  readonly root: string;

  constructor(requestedPath: string, root: string, detail: string) {
    super(`${detail}: ${requestedPath}`);
    this.requestedPath = requestedPath;
    this.root = root;
  }
}

/**
 * A write, permission or directory failure while materializing a file
 */
export class FilesystemError extends DocdriftError {
  readonly path: string;
  /** Node errno code such as ENOENT or EACCES, when known */
  readonly code?: string;

  constructor(path: string, message: string, code?: string) {
    super(message);
    this.path = path;
    this.code = code;
  }

  static fromNodeError(path: string, error: unknown): FilesystemError {
    if (error instanceof FilesystemError) {
      return error;
    }
    const code = errnoCode(error);
    const message = error instanceof Error ? error.message : String(error);
    return new FilesystemError(path, message, code);
  }
}

/**
 * The configuration file or environment held an invalid value
 */
export class ConfigError extends DocdriftError {}

/**
 * The command line could not be understood
 */
export class UsageError extends DocdriftError {}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a Node error
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
