/**
 * Run-scoped variable store
 *
 * Populated by `out-var` / `code-var` captures and read by substitution.
 * Entries are global to the run: they are never cleared between steps and a
 * later capture of the same name overwrites the earlier value.
 */

/** Variable names: letters, digits and underscore, not starting with a digit */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

export class VariableStore {
  private readonly variables = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    for (const [name, value] of Object.entries(initial ?? {})) {
      this.set(name, value);
    }
  }

  /**
   * Set a variable, replacing any previous value
   * @throws Error if `name` is not a valid identifier
   */
  set(name: string, value: string): void {
    if (!isIdentifier(name)) {
      throw new Error(`Invalid variable name: "${name}"`);
    }
    this.variables.set(name, value);
  }

  /** Stored value, or `undefined` when the variable was never set */
  get(name: string): string | undefined {
    return this.variables.get(name);
  }

  has(name: string): boolean {
    return this.variables.has(name);
  }

  /** Copy of all variables, for reports */
  snapshot(): Record<string, string> {
    return Object.fromEntries(this.variables);
  }
}
