/**
 * DSL (Domain Specific Language) types
 *
 * Defines the structure a parsed tutorial is turned into. Everything here is
 * produced once by the parser and never mutated afterwards.
 */

/**
 * How a command's result is compared with the expected value
 */
export type ValidationMode = 'exit' | 'contains' | 'regex' | 'exact';

export type WriteMode = 'write' | 'append';

export type TemplateMode = 'none' | 'shell';

/**
 * Properties shared by all actions
 */
interface BaseAction {
  /** 1-based line of the opening code fence */
  readonly line: number;
  /** Fence language, when one was given (e.g. `bash`) */
  readonly language?: string;
  /** Keep going after this action fails or errors */
  readonly continueOnError: boolean;
  /** Raw annotation values, including keys the engine does not recognize */
  readonly attributes: Readonly<Record<string, string>>;
}

/**
 * Code block that runs as a shell command
 */
export interface RunAction extends BaseAction {
  readonly kind: 'run';
  /** Command text before `${NAME}` substitution */
  readonly command: string;
  readonly mode: ValidationMode;
  /** Expected exit code, substring, pattern or exact output, depending on `mode` */
  readonly expected: string;
  /** 0 disables the timeout */
  readonly timeoutSeconds: number;
  /** Working directory override, relative to the workspace root */
  readonly workingDirectory?: string;
  /** Store the combined output in this variable */
  readonly outVar?: string;
  /** Store the exit code in this variable */
  readonly codeVar?: string;
  /** Write stdout to this file (sandboxed like file actions) */
  readonly outFile?: string;
}

/**
 * Code block whose content is written to a file
 */
export interface FileAction extends BaseAction {
  readonly kind: 'file';
  /** Target path, relative to the workspace root */
  readonly path: string;
  readonly writeMode: WriteMode;
  /** Content before substitution */
  readonly content: string;
  /** chmod +x after writing */
  readonly executable: boolean;
  /** `shell` enables `${NAME}` substitution of the content */
  readonly template: TemplateMode;
  /** Leave an existing file untouched */
  readonly once: boolean;
}

/**
 * Union of all action kinds; the executor handles each one exhaustively
 */
export type Action = RunAction | FileAction;

export type ActionKind = Action['kind'];

/**
 * Titled group of actions, opened by a heading carrying the step marker
 */
export interface Step {
  readonly id: string;
  readonly title: string;
  /** 1-based line of the heading */
  readonly line: number;
  readonly actions: readonly Action[];
}

/**
 * Parsed tutorial document
 */
export interface Tutorial {
  /** First level-1 heading that is not a step */
  readonly title: string;
  /** File path or `<string>` */
  readonly source: string;
  readonly steps: readonly Step[];
}

export * from './schemas.js';
