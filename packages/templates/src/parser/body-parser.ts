import type { Position, SourceLocation, Token } from '../lexer/token.js';
import { TokenType } from '../lexer/token-types.js';
import type { Block, ChildBlock, InterpolatedLiteral, Statement, VariableRef } from './ast-nodes.js';
import {
  isToken,
  mismatchedClose,
  spanOf,
  unclosedGroup,
  unexpectedClose,
  TokenStream,
} from './token-stream.js';
import type { VariableTable } from './variable-table.js';

/**
 * Marker that turns a directly following identifier into a variable reference
 */
export const REFERENCE_MARKER = '*';

const TAB_WIDTH = 4;
const STRING_START = /^[bcr]*#*"/;
const INTERPOLATION = /\*([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Open group awaiting its closing delimiter
 */
interface OpenFrame {
  open: Token;
  block: Block;
  parent: Block;
}

/**
 * Parser for template bodies
 *
 * Folds a flat token sequence into a Block tree. Group nesting is tracked with
 * an explicit stack of open frames.
 */
export class BodyParser {
  private readonly variables: VariableTable;

  constructor(variables: VariableTable) {
    this.variables = variables;
  }

  /**
   * Parse everything left in the stream into one Block.
   * Tokens are consumed one at a time, so errors surface in source order
   *
   * @throws {TemplateSyntaxError} On unbalanced or mismatched groups
   * @throws {UndeclaredVariableError} On a reference to an unknown name
   */
  parse(stream: TokenStream): Block {
    const root = createBlock();
    const stack: OpenFrame[] = [];
    let current = root;
    let first: Token | null = null;
    let last: Token | null = null;

    while (!stream.isEOF()) {
      const token = stream.advance();
      first = first ?? token;
      last = token;

      switch (token.type) {
        case TokenType.OPEN_GROUP: {
          const block = createBlock();
          stack.push({ open: token, block, parent: current });
          current = block;
          break;
        }

        case TokenType.CLOSE_GROUP: {
          const frame = stack.pop();
          if (!frame) {
            throw unexpectedClose(token);
          }
          if (frame.open.delimiter !== token.delimiter) {
            throw mismatchedClose(frame.open, token);
          }
          frame.parent.nodes.push(this.createChildBlock(frame, token));
          current = frame.parent;
          break;
        }

        default: {
          // Only a marker looks at the token after it
          if (
            isToken(token, TokenType.PUNCT, REFERENCE_MARKER) &&
            BodyParser.isReference(token, stream.current)
          ) {
            last = stream.advance();
            current.nodes.push(this.createReference(token, last));
          } else {
            current.nodes.push(this.parseToken(token));
          }
        }
      }
    }

    const unclosed = stack[stack.length - 1];
    if (unclosed) {
      throw unclosedGroup(unclosed.open);
    }

    root.loc = first && last ? spanOf(first, last) : null;
    return root;
  }

  /**
   * Parse a token sequence (EOF optional) into one Block
   */
  parseTokens(tokens: readonly Token[]): Block {
    const last = tokens[tokens.length - 1];
    if (last && last.type === TokenType.EOF) {
      return this.parse(new TokenStream([...tokens]));
    }
    return this.parse(new TokenStream([...tokens, endOfInput(last)]));
  }

  /**
   * `*` written directly against an identifier
   */
  static isReference(token: Token, next: Token): boolean {
    return (
      isToken(token, TokenType.PUNCT, REFERENCE_MARKER) &&
      next.type === TokenType.IDENTIFIER &&
      !next.spaced
    );
  }

  private createReference(marker: Token, identifier: Token): VariableRef {
    const loc = spanOf(marker, identifier);
    this.variables.assertDeclared(identifier.value, loc);
    return {
      type: 'VariableRef',
      name: identifier.value,
      joint: marker.joint,
      loc,
    };
  }

  private createChildBlock(frame: OpenFrame, close: Token): ChildBlock {
    const loc = spanOf(frame.open, close);
    frame.block.loc = loc;
    return {
      type: 'ChildBlock',
      open: frame.open,
      close,
      body: frame.block,
      loc,
    };
  }

  private parseToken(token: Token): Statement {
    if (token.type === TokenType.LITERAL && STRING_START.test(token.value)) {
      const interpolated = this.parseInterpolation(token);
      if (interpolated) {
        return interpolated;
      }
    }
    return { type: 'TokenNode', token, loc: token.loc };
  }

  /**
   * Split a string literal around `*name` references to declared variables
   * Returns null if the literal references nothing
   */
  private parseInterpolation(token: Token): InterpolatedLiteral | null {
    const parts: Array<string | VariableRef> = [];
    let lastIndex = 0;

    for (const match of token.value.matchAll(INTERPOLATION)) {
      const name = match[1];
      const offset = match.index ?? 0;

      // Undeclared names inside strings are ordinary text
      if (!this.variables.has(name)) {
        continue;
      }

      if (offset > lastIndex) {
        parts.push(token.value.slice(lastIndex, offset));
      }
      lastIndex = offset + match[0].length;
      parts.push({
        type: 'VariableRef',
        name,
        joint: false,
        loc: token.loc ? locWithin(token.loc.start, token.value, offset, lastIndex) : null,
      });
    }

    if (lastIndex === 0) {
      return null;
    }
    if (lastIndex < token.value.length) {
      parts.push(token.value.slice(lastIndex));
    }

    return { type: 'InterpolatedLiteral', token, parts, loc: token.loc };
  }

}

/**
 * EOF placed right after the last token of a sequence
 */
function endOfInput(last: Token | undefined): Token {
  const end = last?.loc?.end;
  return {
    type: TokenType.EOF,
    value: '',
    joint: false,
    spaced: false,
    loc: end ? { start: end, end } : null,
  };
}

function createBlock(): Block {
  return { type: 'Block', nodes: [], loc: null };
}

/**
 * Location of `text[from..to]` given the position of `text[0]`
 */
function locWithin(origin: Position, text: string, from: number, to: number): SourceLocation {
  let { line, column } = origin;
  let start: Position | null = null;

  for (let i = 0; i < to; i++) {
    if (i === from) {
      start = { line, column, index: origin.index + i };
    }
    const char = text.charAt(i);
    if (char === '\n') {
      line++;
      column = 0;
    } else {
      column += char === '\t' ? TAB_WIDTH : 1;
    }
  }

  return {
    start: start ?? { ...origin, index: origin.index + from },
    end: { line, column, index: origin.index + to },
  };
}
