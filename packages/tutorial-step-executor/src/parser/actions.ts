/**
 * Mapping of decoded annotations to typed actions
 */

import type { FileAction, RunAction } from '../dsl/index.js';
import { FileAttributesSchema, RunAttributesSchema, formatZodIssues } from '../dsl/schemas.js';
import type { AttributeSet } from '../attributes/index.js';
import { DocumentParseError } from '../errors.js';

/**
 * Build a run action from a `.run` code block
 * @throws DocumentParseError when a recognized attribute has an invalid value
 */
export function buildRunAction(
  attrs: AttributeSet,
  code: string,
  line: number,
  language?: string
): RunAction {
  const values = { ...attrs.values };
  // `expected` is accepted as a long form of `exp`
  if (values.exp === undefined && values.expected !== undefined) {
    values.exp = values.expected;
  }

  const parsed = RunAttributesSchema.safeParse(values);
  if (!parsed.success) {
    throw new DocumentParseError(
      'invalid-attribute',
      line,
      `Invalid .run attributes: ${formatZodIssues(parsed.error)}`
    );
  }
  const data = parsed.data;

  const action: RunAction = {
    kind: 'run',
    line,
    language,
    command: code,
    mode: data.mode,
    expected: data.exp,
    timeoutSeconds: data.timeout,
    workingDirectory: data.workdir,
    continueOnError: data['continue-on-error'],
    outVar: data['out-var'],
    codeVar: data['code-var'],
    outFile: data['out-file'],
    attributes: Object.freeze({ ...attrs.values }),
  };
  return Object.freeze(action);
}

/**
 * Build a file action from a `.file` code block
 * @throws DocumentParseError when `path` is missing or a value is invalid
 */
export function buildFileAction(
  attrs: AttributeSet,
  content: string,
  line: number,
  language?: string
): FileAction {
  const parsed = FileAttributesSchema.safeParse(attrs.values);
  if (!parsed.success) {
    throw new DocumentParseError(
      'invalid-attribute',
      line,
      `Invalid .file attributes: ${formatZodIssues(parsed.error)}`
    );
  }
  const data = parsed.data;

  const action: FileAction = {
    kind: 'file',
    line,
    language,
    path: data.path,
    writeMode: data.mode,
    content,
    executable: data.exec,
    template: data.template,
    once: data.once,
    continueOnError: data['continue-on-error'],
    attributes: Object.freeze({ ...attrs.values }),
  };
  return Object.freeze(action);
}
