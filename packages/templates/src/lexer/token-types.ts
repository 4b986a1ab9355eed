/**
 * Token types for the expansion template lexer
 *
 * The lexer only needs a generic view of host-language text: identifiers,
 * literals, punctuation and the three bracket pairs.
 */

export const TokenType = {
  // Words
  IDENTIFIER: 'IDENTIFIER', // foo, _bar, u64

  // Literals
  LITERAL: 'LITERAL', // 42, -1, 1.5, 0xff, "text", 'c'

  // Single punctuation characters
  PUNCT: 'PUNCT', // + - * & = ; , . etc.

  // Group delimiters
  OPEN_GROUP: 'OPEN_GROUP', // { ( [
  CLOSE_GROUP: 'CLOSE_GROUP', // } ) ]

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Bracket kinds for group tokens
 */
export type Delimiter = 'brace' | 'paren' | 'bracket';

export const OPEN_DELIMITERS: Record<string, Delimiter> = {
  '{': 'brace',
  '(': 'paren',
  '[': 'bracket',
};

export const CLOSE_DELIMITERS: Record<string, Delimiter> = {
  '}': 'brace',
  ')': 'paren',
  ']': 'bracket',
};
