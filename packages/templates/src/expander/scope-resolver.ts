import { UndeclaredVariableError } from '../errors/expansion-error.js';
import type { Block, VariableRef } from '../parser/ast-nodes.js';
import type { Variable, VariableTable } from '../parser/variable-table.js';

/**
 * Variables a Block references directly, and how many copies it expands to
 */
export interface Scope {
  variables: Map<string, Variable>;
  factor: number;
}

/**
 * Collect the references that belong directly to a Block.
 * References inside a ChildBlock belong to that child, not to this Block
 */
export function directReferences(block: Block): VariableRef[] {
  const refs: VariableRef[] = [];

  for (const node of block.nodes) {
    if (node.type === 'VariableRef') {
      refs.push(node);
    } else if (node.type === 'InterpolatedLiteral') {
      for (const part of node.parts) {
        if (typeof part !== 'string') {
          refs.push(part);
        }
      }
    }
  }

  return refs;
}

/**
 * Distinct variable names referenced directly by a Block, in order of first use
 */
export function directRefs(block: Block): string[] {
  return [...new Set(directReferences(block).map((ref) => ref.name))];
}

/**
 * Resolve a Block's direct references against the table and derive its factor:
 * the largest value count among them, or 1 when the Block references nothing
 *
 * @throws {UndeclaredVariableError} If a reference names an unknown variable
 */
export function resolveScope(block: Block, table: VariableTable): Scope {
  const variables = new Map<string, Variable>();
  let factor = 1;

  for (const ref of directReferences(block)) {
    if (variables.has(ref.name)) {
      continue;
    }

    const variable = table.get(ref.name);
    if (!variable) {
      throw new UndeclaredVariableError(`Variable '${ref.name}' is not declared`, ref.loc, ref.name);
    }

    variables.set(ref.name, variable);
    factor = Math.max(factor, variable.values.length);
  }

  return { variables, factor };
}

/**
 * Number of copies a Block expands to
 */
export function duplicationFactor(block: Block, table: VariableTable): number {
  return resolveScope(block, table).factor;
}
