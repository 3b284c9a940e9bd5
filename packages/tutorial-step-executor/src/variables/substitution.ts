/**
 * `${NAME}` substitution
 */

import type { VariableStore } from './store.js';

const REFERENCE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace every `${NAME}` in `text` with its value from the store.
 *
 * Unset variables become the empty string. The text is scanned once, so a
 * substituted value containing `${...}` is left as is.
 */
export function substitute(text: string, variables: VariableStore): string {
  return text.replace(REFERENCE_PATTERN, (_match, name: string) => variables.get(name) ?? '');
}

/**
 * Names referenced by `text`, in order of first appearance
 */
export function findReferences(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(REFERENCE_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}
