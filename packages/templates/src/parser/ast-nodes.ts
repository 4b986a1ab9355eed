/**
 * AST Node Types for expansion templates
 *
 * A template body is a Block: an ordered list of nodes, where a bracketed
 * group becomes a ChildBlock that is scoped and expanded on its own.
 */

import type { SourceLocation, Token } from '../lexer/token.js';

/**
 * Base interface for all AST nodes
 */
export interface Node {
  type: string; // Node type discriminator
  loc: SourceLocation | null; // Position information (null for synthetic nodes)
}

/**
 * A host-language token copied through unchanged
 */
export interface TokenNode extends Node {
  type: 'TokenNode';
  token: Token;
}

/**
 * VariableRef - `*name`, replaced by the current value of `name`
 *
 * Examples:
 * - `*ty`  → name: 'ty', joint: false
 * - `~*ty` → name: 'ty', joint: true
 */
export interface VariableRef extends Node {
  type: 'VariableRef';
  name: string;
  joint: boolean; // Glue the first substituted token to the previous output token
}

/**
 * A string literal with `*name` references inside it
 * Example: "*a + *b = {}" → parts: ['"', ref a, ' + ', ref b, ' = {}"']
 */
export interface InterpolatedLiteral extends Node {
  type: 'InterpolatedLiteral';
  token: Token;
  parts: Array<string | VariableRef>;
}

/**
 * The content between a matched pair of group delimiters
 */
export interface ChildBlock extends Node {
  type: 'ChildBlock';
  open: Token;
  close: Token;
  body: Block;
}

export type Statement = TokenNode | VariableRef | InterpolatedLiteral | ChildBlock;

/**
 * Block - a scope whose duplication factor is computed independently of its parent
 */
export interface Block extends Node {
  type: 'Block';
  nodes: Statement[];
}
