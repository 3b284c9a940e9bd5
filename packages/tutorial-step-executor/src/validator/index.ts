/**
 * Result validation
 *
 * Compares a command's result with the expectation declared on its code block.
 */

import type { ValidationMode } from '../dsl/index.js';
import type { CommandResult } from '../sandbox/index.js';

export interface ValidationOutcome {
  passed: boolean;
  /** Human-readable summary, e.g. `Exit code 1 != expected 0` */
  message: string;
  expected: string;
  /** Exit code for `exit`, combined output otherwise */
  actual: string;
}

/**
 * Validate a command result
 *
 * | mode     | semantics                                                    |
 * |----------|--------------------------------------------------------------|
 * | exit     | exit code equals the expected integer                        |
 * | contains | combined output contains the expected string                 |
 * | regex    | the pattern matches somewhere in the combined output         |
 * | exact    | output minus one trailing newline equals the expected string |
 */
export function validateResult(
  result: Pick<CommandResult, 'exitCode' | 'output'>,
  mode: ValidationMode,
  expected: string
): ValidationOutcome {
  const output = result.output;

  switch (mode) {
    case 'exit': {
      const expectedCode = Number.parseInt(expected.trim(), 10);
      const actual = String(result.exitCode);
      return result.exitCode === expectedCode
        ? { passed: true, message: `Exit code matched: ${expectedCode}`, expected, actual }
        : { passed: false, message: `Exit code ${result.exitCode} != expected ${expected.trim()}`, expected, actual };
    }

    case 'contains':
      return output.includes(expected)
        ? { passed: true, message: `Output contains: '${expected}'`, expected, actual: output }
        : { passed: false, message: `Output does not contain: '${expected}'`, expected, actual: output };

    case 'regex': {
      let pattern: RegExp;
      try {
        pattern = new RegExp(expected, 'm');
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return { passed: false, message: `Invalid regex pattern: ${reason}`, expected, actual: output };
      }
      return pattern.test(output)
        ? { passed: true, message: `Output matches regex: ${expected}`, expected, actual: output }
        : { passed: false, message: `Output does not match regex: ${expected}`, expected, actual: output };
    }

    case 'exact': {
      const actual = stripTrailingNewline(output);
      return actual === expected
        ? { passed: true, message: 'Output matches exactly', expected, actual }
        : { passed: false, message: 'Output does not match exactly', expected, actual };
    }

    default: {
      const unknown: never = mode;
      throw new Error(`Unknown validation mode: ${String(unknown)}`);
    }
  }
}

/**
 * Remove exactly one trailing `\n`, if present
 */
export function stripTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}
