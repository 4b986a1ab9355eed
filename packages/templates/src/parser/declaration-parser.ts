import type { Logger } from '@kindred/logger';
import {
  RangeLimitError,
  TemplateSyntaxError,
  TypeMismatchError,
  errorAt,
} from '../errors/expansion-error.js';
import { Expander } from '../expander/expander.js';
import type { Token } from '../lexer/token.js';
import { TokenType } from '../lexer/token-types.js';
import { flattenBlocks } from '../serializer/serializer.js';
import { BodyParser, REFERENCE_MARKER } from './body-parser.js';
import {
  findGroupEnd,
  isToken,
  mismatchedClose,
  spanOf,
  unclosedGroup,
  type TokenStream,
} from './token-stream.js';
import { VariableTable, type Value } from './variable-table.js';

/**
 * Keyword for an empty value
 */
export const NONE = 'NONE';

/**
 * Largest value of an unsigned 64-bit range bound
 */
const U64_MAX = 2n ** 64n - 1n;

export interface DeclarationParserOptions {
  // Upper limit on the number of values a range may produce; unlimited when unset
  maxRangeLength?: number;
  logger?: Logger;
}

/**
 * Tokens read up to a list separator or a closing delimiter
 */
interface Run {
  tokens: Token[];
  end: Token;
}

/**
 * Parser for the declaration prefix of a template
 *
 * ```
 * let &name = [ value (, value)* ] ;
 * let &name = { ...single multi-token value... } ;
 * let &name = low..high ;
 * let &name = low..=high ;
 * let &name = NONE ;
 * ```
 *
 * Values may reference variables declared earlier; they are expanded when
 * the declaration is read.
 */
export class DeclarationParser {
  private readonly maxRangeLength: number | null;
  private readonly logger: Logger | undefined;

  constructor(options: DeclarationParserOptions = {}) {
    this.maxRangeLength = options.maxRangeLength ?? null;
    this.logger = options.logger;
  }

  /**
   * Consume declarations from the front of the stream
   *
   * @returns The frozen variable table
   */
  parse(stream: TokenStream): VariableTable {
    const table = new VariableTable();

    while (isAtDeclaration(stream)) {
      this.parseDeclaration(stream, table);
    }

    return table.freeze();
  }

  private parseDeclaration(stream: TokenStream, table: VariableTable): void {
    const letToken = stream.advance();
    stream.advance(); // &

    const nameToken = stream.expect(
      TokenType.IDENTIFIER,
      undefined,
      "Expected variable name after 'let &'",
    );
    const name = nameToken.value;

    // The name is checked before the value so a redeclaration is reported first
    table.assertUndeclared(name, nameToken.loc);

    stream.expect(TokenType.PUNCT, '=', `Expected '=' after 'let &${name}'`);
    const values = this.parseValueSource(stream, table, name);
    const semicolon = stream.expect(
      TokenType.PUNCT,
      ';',
      `Expected ';' after declaration of '${name}'`,
    );

    table.define({ name, values, loc: spanOf(letToken, semicolon) });
  }

  /**
   * Parse the right-hand side of a declaration
   */
  private parseValueSource(stream: TokenStream, table: VariableTable, name: string): Value[] {
    const current = stream.current;

    if (isToken(current, TokenType.OPEN_GROUP) && current.delimiter === 'bracket') {
      return this.parseList(stream, table);
    }

    if (isToken(current, TokenType.OPEN_GROUP) && current.delimiter === 'brace') {
      const open = stream.advance();
      const { tokens } = readRun(stream, table, open, false);
      return [this.buildValue(table, tokens)];
    }

    if (isToken(current, TokenType.IDENTIFIER, NONE)) {
      stream.advance();
      return [[]];
    }

    if (isAtRange(stream)) {
      return this.parseRange(stream);
    }

    throw errorAt(
      TemplateSyntaxError,
      `Expected a value list, { value }, range or ${NONE} for '${name}'`,
      current,
      stream.getErrorContext(),
    );
  }

  /**
   * Parse `[ value, value, ... ]`, one item at a time
   */
  private parseList(stream: TokenStream, table: VariableTable): Value[] {
    const open = stream.advance();
    const values: Value[] = [];
    let separator: Token | null = null;

    for (;;) {
      const { tokens, end } = readRun(stream, table, open, true);
      const closed = end.type === TokenType.CLOSE_GROUP;

      if (tokens.length > 0) {
        values.push(this.parseItem(table, tokens));
      } else if (!closed) {
        throw errorAt(TemplateSyntaxError, 'Empty value in list', separator ?? open);
      } else if (values.length === 0) {
        throw errorAt(TemplateSyntaxError, 'Value list must contain at least one value', open);
      }
      // Otherwise the empty run follows a trailing comma

      if (closed) {
        return values;
      }
      separator = end;
    }
  }

  private parseItem(table: VariableTable, tokens: Token[]): Value {
    const first = tokens[0];
    if (tokens.length === 1 && isToken(first, TokenType.IDENTIFIER, NONE)) {
      return [];
    }

    if (treeLength(tokens) !== tokens.length) {
      throw errorAt(
        TemplateSyntaxError,
        'Multi-token values must be wrapped in { }',
        first,
        tokens,
      );
    }

    // {...} contributes its contents; [..] and (..) keep their delimiters
    if (first.type === TokenType.OPEN_GROUP && first.delimiter === 'brace') {
      return this.buildValue(table, tokens.slice(1, -1));
    }
    return this.buildValue(table, tokens);
  }

  /**
   * Parse `low..high` or `low..=high` into its list of values
   */
  private parseRange(stream: TokenStream): Value[] {
    const lowToken = stream.advance();
    stream.advance(); // .
    stream.advance(); // .

    const inclusive = stream.match(TokenType.PUNCT, '=') && stream.current.joint;
    if (inclusive) {
      stream.advance();
    }

    const highToken = stream.current;
    if (highToken.type !== TokenType.LITERAL && highToken.type !== TokenType.IDENTIFIER) {
      throw errorAt(
        TemplateSyntaxError,
        'Expected an upper bound after range operator',
        highToken,
        stream.getErrorContext(),
      );
    }
    stream.advance();

    const low = parseBound(lowToken);
    const high = parseBound(highToken);
    const operator = inclusive ? '..=' : '..';
    const label = `${lowToken.value}${operator}${highToken.value}`;

    if (low > high) {
      throw errorAt(TypeMismatchError, `Range ${label} is descending`, lowToken);
    }

    const end = inclusive ? high + 1n : high;
    const length = end - low;
    if (length === 0n) {
      throw errorAt(TypeMismatchError, `Range ${label} contains no values`, lowToken);
    }
    if (this.maxRangeLength !== null && length > BigInt(this.maxRangeLength)) {
      throw errorAt(
        RangeLimitError,
        `Range ${label} has ${length} values, more than the limit of ${this.maxRangeLength}`,
        lowToken,
      );
    }

    const values: Value[] = [];
    for (let n = low; n < end; n++) {
      values.push([syntheticLiteral(n.toString())]);
    }
    return values;
  }

  /**
   * Parse value tokens as a Block, expand it against the variables declared so
   * far, and join the copies into one Value
   */
  private buildValue(table: VariableTable, tokens: Token[]): Value {
    const block = new BodyParser(table).parseTokens(tokens);
    const copies = new Expander(table, { logger: this.logger }).expand(block);
    const value = flattenBlocks(copies);

    // Spacing before the value is decided at the reference site
    if (value.length > 0) {
      value[0] = { ...value[0], joint: false };
    }
    return value;
  }
}

/**
 * A declaration starts with `let` followed by `&`
 */
function isAtDeclaration(stream: TokenStream): boolean {
  return stream.match(TokenType.IDENTIFIER, 'let') && isToken(stream.peek(), TokenType.PUNCT, '&');
}

function isAtRange(stream: TokenStream): boolean {
  const bound = stream.current;
  return (
    (bound.type === TokenType.LITERAL || bound.type === TokenType.IDENTIFIER) &&
    isToken(stream.peek(1), TokenType.PUNCT, '.') &&
    isToken(stream.peek(2), TokenType.PUNCT, '.') &&
    stream.peek(2).joint
  );
}

/**
 * Consume tokens up to the delimiter that closes `open`, or up to a top-level
 * comma when `splitOnComma` is set. Nested groups and references are checked
 * as they are read, so the first error in source order is the one reported
 */
function readRun(
  stream: TokenStream,
  table: VariableTable,
  open: Token,
  splitOnComma: boolean,
): Run {
  const tokens: Token[] = [];
  const stack: Token[] = [];

  for (;;) {
    const token = stream.advance();

    if (token.type === TokenType.EOF) {
      throw unclosedGroup(stack[stack.length - 1] ?? open);
    }

    if (stack.length === 0) {
      if (splitOnComma && isToken(token, TokenType.PUNCT, ',')) {
        return { tokens, end: token };
      }
      if (token.type === TokenType.CLOSE_GROUP) {
        if (token.delimiter !== open.delimiter) {
          throw mismatchedClose(open, token);
        }
        return { tokens, end: token };
      }
    }

    if (token.type === TokenType.OPEN_GROUP) {
      stack.push(token);
    } else if (token.type === TokenType.CLOSE_GROUP) {
      const inner = stack.pop();
      if (inner && inner.delimiter !== token.delimiter) {
        throw mismatchedClose(inner, token);
      }
    }

    tokens.push(token);

    if (
      isToken(token, TokenType.PUNCT, REFERENCE_MARKER) &&
      BodyParser.isReference(token, stream.current)
    ) {
      const identifier = stream.advance();
      table.assertDeclared(identifier.value, spanOf(token, identifier));
      tokens.push(identifier);
    }
  }
}

/**
 * Number of tokens in the leading token tree: a whole group, a `*name`
 * reference, or a single token
 */
function treeLength(tokens: readonly Token[]): number {
  const [first, second] = tokens;
  if (first.type === TokenType.OPEN_GROUP) {
    return findGroupEnd(tokens, 0) + 1;
  }
  if (second && BodyParser.isReference(first, second)) {
    return 2;
  }
  return 1;
}

/**
 * Parse a range bound as an unsigned 64-bit integer
 *
 * @throws {TypeMismatchError} If the bound is not one
 */
function parseBound(token: Token): bigint {
  if (token.type !== TokenType.LITERAL || !/^[0-9]+$/.test(token.value)) {
    throw errorAt(
      TypeMismatchError,
      `Range bound '${token.value}' is not an unsigned integer`,
      token,
    );
  }

  const value = BigInt(token.value);
  if (value > U64_MAX) {
    throw errorAt(
      TypeMismatchError,
      `Range bound '${token.value}' does not fit in 64 bits`,
      token,
    );
  }
  return value;
}

function syntheticLiteral(value: string): Token {
  return { type: TokenType.LITERAL, value, joint: false, spaced: false, loc: null };
}
