/**
 * Template Expander
 *
 * Tree-walking expander that turns a Block into `factor` substituted copies.
 * Every ChildBlock is expanded once, from its own direct references, and the
 * same copies are spliced into every copy of its parent.
 */

import type { Logger } from '@kindred/logger';
import type { Token } from '../lexer/token.js';
import type { Block, InterpolatedLiteral, Statement, VariableRef } from '../parser/ast-nodes.js';
import type { Value, Variable, VariableTable } from '../parser/variable-table.js';
import { serializeTokens } from '../serializer/serializer.js';
import type { ExpandedBlock, ExpandedNode } from './expanded-nodes.js';
import { resolveScope, type Scope } from './scope-resolver.js';

/**
 * Options for configuring the expander.
 */
export interface ExpanderOptions {
  // Receives a debug entry for every scope expanded
  logger?: Logger;
}

export class Expander {
  private readonly variables: VariableTable;
  private readonly logger: Logger | undefined;
  // Copies per Block, computed on first use
  private readonly expanded = new Map<Block, ExpandedBlock[]>();

  /**
   * @param variables - Table every reference resolves against
   * @param options - Optional logger
   */
  constructor(variables: VariableTable, options: ExpanderOptions = {}) {
    this.variables = variables;
    this.logger = options.logger;
  }

  /**
   * Expand a Block into its copies
   *
   * @throws {UndeclaredVariableError} If a reference names an unknown variable
   */
  expand(block: Block): ExpandedBlock[] {
    const cached = this.expanded.get(block);
    if (cached) {
      return cached;
    }

    const scope = resolveScope(block, this.variables);

    this.logger?.debug('scope_expanded', {
      factor: scope.factor,
      refs: [...scope.variables.keys()],
      line: block.loc?.start.line ?? null,
    });

    const copies: ExpandedBlock[] = [];
    for (let i = 0; i < scope.factor; i++) {
      copies.push({ nodes: block.nodes.flatMap((node) => this.expandNode(node, scope, i)) });
    }

    this.expanded.set(block, copies);
    return copies;
  }

  private expandNode(node: Statement, scope: Scope, iteration: number): ExpandedNode[] {
    switch (node.type) {
      case 'TokenNode':
        return [{ kind: 'token', token: node.token }];

      case 'VariableRef':
        return this.substitute(node, scope, iteration).map(
          (token): ExpandedNode => ({ kind: 'token', token }),
        );

      case 'InterpolatedLiteral':
        return [{ kind: 'token', token: this.interpolate(node, scope, iteration) }];

      case 'ChildBlock':
        return [
          {
            kind: 'group',
            open: node.open,
            copies: this.expand(node.body),
            close: node.close,
          },
        ];
    }
  }

  /**
   * Tokens of the reference's value for this iteration.
   * The first token takes the reference's spacing
   */
  private substitute(ref: VariableRef, scope: Scope, iteration: number): Token[] {
    const value = valueAt(this.lookup(ref, scope), iteration);
    return value.map((token, index) => (index === 0 ? { ...token, joint: ref.joint } : token));
  }

  /**
   * Rebuild a string literal with each reference replaced by its value's text
   */
  private interpolate(node: InterpolatedLiteral, scope: Scope, iteration: number): Token {
    const value = node.parts
      .map((part) =>
        typeof part === 'string'
          ? part
          : serializeTokens(valueAt(this.lookup(part, scope), iteration)),
      )
      .join('');

    return { ...node.token, value };
  }

  private lookup(ref: VariableRef, scope: Scope): Variable {
    const variable = scope.variables.get(ref.name);
    if (!variable) {
      // resolveScope registers every direct reference
      throw new Error(`Reference '${ref.name}' was not resolved for this scope`);
    }
    return variable;
  }
}

/**
 * Clamp-last: past the end of a shorter variable, its final value repeats
 */
export function valueAt(variable: Variable, iteration: number): Value {
  return variable.values[Math.min(iteration, variable.values.length - 1)];
}

/**
 * Expand a Block against a table in one call
 */
export function expand(
  block: Block,
  variables: VariableTable,
  options: ExpanderOptions = {},
): ExpandedBlock[] {
  return new Expander(variables, options).expand(block);
}
