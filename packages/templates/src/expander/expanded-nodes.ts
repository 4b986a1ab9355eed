import type { Token } from '../lexer/token.js';

/**
 * A token in expanded output
 */
export interface ExpandedToken {
  kind: 'token';
  token: Token;
}

/**
 * An expanded ChildBlock: its delimiters around every copy of its body
 */
export interface ExpandedGroup {
  kind: 'group';
  open: Token;
  copies: ExpandedBlock[];
  close: Token;
}

export type ExpandedNode = ExpandedToken | ExpandedGroup;

/**
 * One fully substituted copy of a Block
 */
export interface ExpandedBlock {
  nodes: ExpandedNode[];
}
