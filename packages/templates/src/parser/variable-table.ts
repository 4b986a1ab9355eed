import { DuplicateDeclarationError, UndeclaredVariableError } from '../errors/expansion-error.js';
import type { SourceLocation, Token } from '../lexer/token.js';

/**
 * One substitution option for a variable; an empty Value (NONE) emits nothing
 */
export type Value = readonly Token[];

export interface Variable {
  readonly name: string;
  readonly values: readonly Value[];
  readonly loc: SourceLocation | null;
}

/**
 * Mapping from variable name to its values
 *
 * Filled by the declaration parser in source order, then frozen. Names are
 * case-sensitive and declared exactly once.
 */
export class VariableTable implements Iterable<Variable> {
  private readonly variables = new Map<string, Variable>();
  private frozen = false;

  /**
   * Add a variable
   *
   * @throws {DuplicateDeclarationError} If the name is already declared
   */
  define(variable: Variable): void {
    if (this.frozen) {
      throw new Error('VariableTable is frozen once the declaration region ends');
    }

    this.assertUndeclared(variable.name, variable.loc);
    this.variables.set(variable.name, variable);
  }

  /**
   * @throws {DuplicateDeclarationError} If the name is already declared
   */
  assertUndeclared(name: string, loc: SourceLocation | null): void {
    const existing = this.variables.get(name);
    if (existing) {
      const line = existing.loc?.start.line;
      throw new DuplicateDeclarationError(
        `Variable '${name}' is already declared${line !== undefined ? ` (line ${line})` : ''}`,
        loc,
        name,
      );
    }
  }

  /**
   * @throws {UndeclaredVariableError} If the name has not been declared (yet)
   */
  assertDeclared(name: string, loc: SourceLocation | null): void {
    if (!this.variables.has(name)) {
      throw new UndeclaredVariableError(`Variable '${name}' is not declared before use`, loc, name);
    }
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  has(name: string): boolean {
    return this.variables.has(name);
  }

  get(name: string): Variable | undefined {
    return this.variables.get(name);
  }

  names(): string[] {
    return [...this.variables.keys()];
  }

  get size(): number {
    return this.variables.size;
  }

  [Symbol.iterator](): Iterator<Variable> {
    return this.variables.values();
  }
}
