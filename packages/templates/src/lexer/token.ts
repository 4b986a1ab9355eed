/**
 * Position in source code
 */
export interface Position {
  line: number; // Line number (1-based)
  column: number; // Column number (0-based)
  index: number; // Character index (0-based)
}

/**
 * Source location with start and end positions
 */
export interface SourceLocation {
  start: Position; // Starting position
  end: Position; // Ending position
}

/**
 * Token produced by lexer
 */
export interface Token {
  type: TokenType; // The token type
  value: string; // The lexeme (raw text, quotes included for strings)
  delimiter?: Delimiter; // Bracket kind, only for OPEN_GROUP / CLOSE_GROUP
  joint: boolean; // Suppress the separator normally emitted before this token
  spaced: boolean; // Whitespace or a comment preceded the token
  loc: SourceLocation | null; // Position info (null for synthetic tokens)
}

import type { Delimiter, TokenType } from './token-types.js';
