import { TemplateSyntaxError, errorAt } from '../errors/expansion-error.js';
import type { SourceLocation, Token } from '../lexer/token.js';
import { TokenType } from '../lexer/token-types.js';

const CLOSING_CHAR: Record<string, string> = { '{': '}', '(': ')', '[': ']' };

/**
 * Anything that produces tokens one at a time, ending with EOF
 */
export interface TokenSource {
  lex(): Token;
}

/**
 * Cursor over a token sequence that always ends with an EOF token.
 *
 * Tokens are pulled from the source only when the parser looks at them, so a
 * lexing error further on never hides an earlier parse error.
 */
export class TokenStream {
  private readonly buffer: Token[];
  private readonly source: TokenSource | null;
  private position: number = 0;

  /**
   * @param source - A lexer to read from, or an already lexed array terminated by EOF
   */
  constructor(source: TokenSource | Token[]) {
    if (Array.isArray(source)) {
      const last = source[source.length - 1];
      if (!last || last.type !== TokenType.EOF) {
        throw new Error('TokenStream requires a token array terminated by EOF');
      }
      this.buffer = [...source];
      this.source = null;
    } else {
      this.buffer = [];
      this.source = source;
    }
  }

  /**
   * Get the current position in the token stream
   */
  getPosition(): number {
    return this.position;
  }

  /**
   * The token being processed (EOF once the stream is exhausted)
   */
  get current(): Token {
    return this.fill(this.position);
  }

  /**
   * Look ahead at a token without consuming it
   *
   * @param offset - Number of tokens to look ahead (default 1)
   * @returns The token at the offset position, clamped to EOF
   */
  peek(offset: number = 1): Token {
    return this.fill(Math.max(0, this.position + offset));
  }

  /**
   * Consume the current token and return it.
   * The token after it is not read until it is looked at
   */
  advance(): Token {
    const token = this.current;
    if (token.type !== TokenType.EOF) {
      this.position++;
    }
    return token;
  }

  /**
   * Check if the current token matches the given type (and value)
   */
  match(type: TokenType, value?: string): boolean {
    return isToken(this.current, type, value);
  }

  isEOF(): boolean {
    return this.current.type === TokenType.EOF;
  }

  /**
   * Assert that the current token matches and consume it
   *
   * @throws {TemplateSyntaxError} If the current token does not match
   */
  expect(type: TokenType, value: string | undefined, message: string): Token {
    if (!this.match(type, value)) {
      throw errorAt(TemplateSyntaxError, message, this.current, this.getErrorContext());
    }
    return this.advance();
  }

  /**
   * A few tokens around the current position for error messages.
   * Only tokens already read are used
   */
  getErrorContext(): Token[] {
    const start = Math.max(0, this.position - 2);
    const end = Math.min(this.buffer.length, this.position + 3);
    return this.buffer.slice(start, end).filter((t) => t.type !== TokenType.EOF);
  }

  /**
   * Token at `index`, reading from the source as needed
   */
  private fill(index: number): Token {
    let last = this.buffer[this.buffer.length - 1];

    while (this.buffer.length <= index && this.source && (!last || last.type !== TokenType.EOF)) {
      last = this.source.lex();
      this.buffer.push(last);
    }

    return this.buffer[Math.min(index, this.buffer.length - 1)];
  }
}

export function isToken(token: Token, type: TokenType, value?: string): boolean {
  return token.type === type && (value === undefined || token.value === value);
}

/**
 * Span from the start of one token to the end of another
 */
export function spanOf(first: Token, last: Token): SourceLocation | null {
  if (!first.loc || !last.loc) {
    return first.loc ?? last.loc;
  }
  return { start: first.loc.start, end: last.loc.end };
}

/**
 * Index of the token closing the group opened at `openIndex`
 *
 * @throws {TemplateSyntaxError} On a mismatched or unterminated group
 */
export function findGroupEnd(tokens: readonly Token[], openIndex: number): number {
  const stack: Token[] = [];

  for (let i = openIndex; i < tokens.length; i++) {
    const token = tokens[i];

    if (token.type === TokenType.OPEN_GROUP) {
      stack.push(token);
    } else if (token.type === TokenType.CLOSE_GROUP) {
      const open = stack.pop();
      if (!open) {
        throw unexpectedClose(token);
      }
      if (open.delimiter !== token.delimiter) {
        throw mismatchedClose(open, token);
      }
      if (stack.length === 0) {
        return i;
      }
    }
  }

  throw unclosedGroup(stack[stack.length - 1] ?? tokens[openIndex]);
}

export function unexpectedClose(token: Token): TemplateSyntaxError {
  return errorAt(TemplateSyntaxError, `Unexpected closing '${token.value}'`, token);
}

export function mismatchedClose(open: Token, close: Token): TemplateSyntaxError {
  const line = open.loc ? ` at line ${open.loc.start.line}` : '';
  return errorAt(
    TemplateSyntaxError,
    `Mismatched closing '${close.value}': expected '${CLOSING_CHAR[open.value] ?? '?'}' to close '${open.value}'${line}`,
    close,
  );
}

export function unclosedGroup(open: Token): TemplateSyntaxError {
  return errorAt(
    TemplateSyntaxError,
    `Unclosed '${open.value}': expected closing '${CLOSING_CHAR[open.value] ?? '?'}'`,
    open,
  );
}
