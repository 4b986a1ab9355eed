import { TemplateSyntaxError } from '../errors/expansion-error.js';
import type { Position, Token } from './token.js';
import { CLOSE_DELIMITERS, OPEN_DELIMITERS, TokenType } from './token-types.js';

/**
 * Character that marks the following token as joint
 */
const JOINT_MODIFIER = '~';

/**
 * Identifier prefixes that turn a following quote into a prefixed literal
 * (byte strings, raw strings, C strings)
 */
const STRING_PREFIXES = new Set(['b', 'c', 'r', 'br', 'cr']);

/**
 * Lexer for expansion templates
 *
 * Splits host-language-shaped text into identifiers, literals, punctuation and
 * group delimiters, recording for every token whether it should be glued to the
 * previous one when the text is written back out.
 */
export class Lexer {
  private input: string = '';
  private index: number = 0;
  private line: number = 1;
  private column: number = 0;
  private tabWidth: number = 4; // Number of spaces a tab counts as
  // Last emitted token, used for negative literals and punctuation spacing
  private lastToken: Token | null = null;

  /**
   * Initialize lexer with template string
   */
  setInput(template: string): void {
    this.input = template;
    this.index = 0;
    this.line = 1;
    this.column = 0;
    this.lastToken = null;
  }

  /**
   * Extract next token from input
   * Returns EOF token when end of input is reached
   */
  lex(): Token {
    const spaced = this.skipTrivia();

    if (this.isEOF()) {
      return this.createEOFToken(spaced);
    }

    const joint = this.scanJointModifiers();
    const token = this.scanToken(spaced);
    token.spaced = spaced;

    // Punctuation written without whitespace stays glued (+=, =>, ::, &mut)
    token.joint = joint || (!spaced && this.lastToken?.type === TokenType.PUNCT);

    this.lastToken = token;
    return token;
  }

  /**
   * Consume one or more `~` markers in front of a token
   * Returns true if at least one was present
   */
  private scanJointModifiers(): boolean {
    let joint = false;

    while (this.peek() === JOINT_MODIFIER) {
      const start = this.getPosition();
      this.advance();

      if (this.isEOF() || this.isWhitespace(this.peek()) || this.isCommentStart()) {
        throw new TemplateSyntaxError(
          `Joint modifier '${JOINT_MODIFIER}' must be immediately followed by a token`,
          { start, end: this.getPosition() },
          JOINT_MODIFIER,
        );
      }

      joint = true;
    }

    return joint;
  }

  /**
   * Scan a single token starting at the current character
   */
  private scanToken(spaced: boolean): Token {
    const char = this.peek();

    // String literals
    if (char === '"') {
      return this.scanString(this.getPosition(), '');
    }

    // Char literals, or a lone quote ('a lifetime)
    if (char === "'") {
      return this.scanCharOrQuote(this.getPosition(), '');
    }

    // Number literals, including a negative sign where no operand precedes it
    if (this.isDigit(char) || (char === '-' && this.isDigit(this.peekAt(1)) && !this.followsOperand())) {
      return this.scanNumber(spaced);
    }

    if (this.isIdentifierStart(char)) {
      return this.scanIdentifier();
    }

    const open = OPEN_DELIMITERS[char];
    if (open) {
      return this.scanDelimiter(TokenType.OPEN_GROUP, char, open);
    }

    const close = CLOSE_DELIMITERS[char];
    if (close) {
      return this.scanDelimiter(TokenType.CLOSE_GROUP, char, close);
    }

    return this.scanPunct();
  }

  /**
   * Skip whitespace and comments
   * Returns true if anything was skipped
   */
  private skipTrivia(): boolean {
    let skipped = false;

    while (!this.isEOF()) {
      if (this.isWhitespace(this.peek())) {
        this.advance();
      } else if (this.match('//')) {
        this.skipLineComment();
      } else if (this.match('/*')) {
        this.skipBlockComment();
      } else {
        break;
      }
      skipped = true;
    }

    return skipped;
  }

  private skipLineComment(): void {
    while (!this.isEOF() && this.peek() !== '\n') {
      this.advance();
    }
  }

  /**
   * Skip a block comment; block comments nest
   */
  private skipBlockComment(): void {
    const start = this.getPosition();
    let depth = 0;

    while (!this.isEOF()) {
      if (this.match('/*')) {
        this.consumeChars(2);
        depth++;
      } else if (this.match('*/')) {
        this.consumeChars(2);
        depth--;
        if (depth === 0) {
          return;
        }
      } else {
        this.advance();
      }
    }

    throw new TemplateSyntaxError(
      "Unclosed block comment: expected closing '*/'",
      { start, end: this.getPosition() },
      '/*',
    );
  }

  /**
   * Scan a group delimiter ({ } ( ) [ ])
   */
  private scanDelimiter(
    type: typeof TokenType.OPEN_GROUP | typeof TokenType.CLOSE_GROUP,
    char: string,
    delimiter: Token['delimiter'],
  ): Token {
    const start = this.getPosition();
    this.advance();
    const token = this.createToken(type, char, start);
    token.delimiter = delimiter;
    return token;
  }

  /**
   * Scan a single punctuation character
   */
  private scanPunct(): Token {
    const start = this.getPosition();
    const value = this.advance();
    return this.createToken(TokenType.PUNCT, value, start);
  }

  /**
   * Scan an identifier
   * Identifiers start with a letter or _ and continue with letters, digits or _.
   * A string prefix (b, r, br, c, cr) directly followed by a quote starts a literal
   */
  private scanIdentifier(): Token {
    const start = this.getPosition();
    const value = this.scanWhile((c) => this.isAlphaNumeric(c));

    if (STRING_PREFIXES.has(value)) {
      const next = this.peek();
      if (next === '"' || (value.includes('r') && this.isRawStringStart())) {
        return this.scanString(start, value);
      }
      if (next === "'" && value === 'b') {
        return this.scanCharOrQuote(start, value);
      }
    }

    // Raw identifier: r#type
    if (value === 'r' && this.peek() === '#' && this.isIdentifierStart(this.peekAt(1))) {
      const name = this.consumeChars(1) + this.scanWhile((c) => this.isAlphaNumeric(c));
      return this.createToken(TokenType.IDENTIFIER, value + name, start);
    }

    return this.createToken(TokenType.IDENTIFIER, value, start);
  }

  /**
   * True when one or more `#` are followed by the opening quote of a raw string
   */
  private isRawStringStart(): boolean {
    let offset = 0;
    while (this.peekAt(offset) === '#') {
      offset++;
    }
    return offset > 0 && this.peekAt(offset) === '"';
  }

  /**
   * Scan a number literal (123, -42, 1.5, 1e-9, 0xff, 10u64, 1_000)
   * After a glued `.` (tuple.0.1) the dot separates fields instead of starting a fraction
   */
  private scanNumber(spaced: boolean): Token {
    const start = this.getPosition();
    let value = '';

    // Handle negative sign
    if (this.peek() === '-') {
      value += this.advance();
    }

    value += this.scanWhile((c) => this.isAlphaNumeric(c));

    if (this.shouldScanDecimal(spaced) && this.peek() === '.') {
      const next = this.peekAt(1);
      if (this.isDigit(next)) {
        value += this.advance(); // Consume '.'
        value += this.scanWhile((c) => this.isAlphaNumeric(c));
      } else if (next !== '.' && !this.isIdentifierStart(next)) {
        // Trailing dot float: 1.
        value += this.advance();
      }
    }

    // Signed exponent: 1e-9, 2.5E+3
    if (/^-?\d[\d_]*(\.[\d_]*)?[eE]$/.test(value)) {
      const sign = this.peek();
      if ((sign === '-' || sign === '+') && this.isDigit(this.peekAt(1))) {
        value += this.advance();
        value += this.scanWhile((c) => this.isAlphaNumeric(c));
      }
    }

    return this.createToken(TokenType.LITERAL, value, start);
  }

  /**
   * Determine if we should scan a decimal point as part of a number
   * Returns false when the number is a field index glued to a preceding dot
   */
  private shouldScanDecimal(spaced: boolean): boolean {
    const last = this.lastToken;
    return spaced || last === null || last.type !== TokenType.PUNCT || last.value !== '.';
  }

  /**
   * Scan a string literal, optionally raw (r"..", r#".."#)
   * The token value keeps the prefix, quotes and escapes exactly as written
   */
  private scanString(start: Position, prefix: string): Token {
    let value = prefix;

    if (prefix.includes('r')) {
      let hashes = '';
      while (this.peek() === '#') {
        hashes += this.advance();
      }
      value += hashes + this.advance(); // Opening quote

      const terminator = `"${hashes}`;
      while (!this.isEOF() && !this.match(terminator)) {
        value += this.advance();
      }
      if (this.isEOF()) {
        throw new TemplateSyntaxError(
          `Unclosed string: expected closing ${terminator}`,
          { start, end: this.getPosition() },
          value.slice(0, 20),
        );
      }
      value += this.consumeChars(terminator.length);
      return this.createToken(TokenType.LITERAL, value, start);
    }

    value += this.advance(); // Consume opening quote
    value += this.scanQuotedContent('"');

    // Check for unclosed string
    if (this.isEOF()) {
      throw new TemplateSyntaxError(
        'Unclosed string: expected closing "',
        { start, end: this.getPosition() },
        value.slice(0, 20),
      );
    }

    value += this.advance(); // Consume closing quote
    return this.createToken(TokenType.LITERAL, value, start);
  }

  /**
   * Scan a char literal ('a', '\n', '\u{1F600}')
   * A quote that does not close as a char literal ('a lifetime, 'label) is punctuation
   */
  private scanCharOrQuote(start: Position, prefix: string): Token {
    const isEscaped = this.peekAt(1) === '\\';
    const isSingleChar =
      this.peekAt(1) !== '' && this.peekAt(1) !== "'" && this.peekAt(1) !== '\n' && this.peekAt(2) === "'";

    if (!isEscaped && !isSingleChar) {
      if (prefix !== '') {
        throw new TemplateSyntaxError(
          'Unclosed char literal: expected closing \'',
          { start, end: this.getPosition() },
          prefix,
        );
      }
      return this.scanPunct();
    }

    let value = prefix + this.advance(); // Consume opening quote
    value += this.scanQuotedContent("'", true);

    if (this.peek() !== "'") {
      throw new TemplateSyntaxError(
        "Unclosed char literal: expected closing '",
        { start, end: this.getPosition() },
        value,
      );
    }

    value += this.advance(); // Consume closing quote
    return this.createToken(TokenType.LITERAL, value, start);
  }

  /**
   * Scan quoted content up to (not including) the closing quote.
   * Escape sequences are kept verbatim
   */
  private scanQuotedContent(quote: string, singleLine: boolean = false): string {
    let value = '';

    while (!this.isEOF() && this.peek() !== quote) {
      if (singleLine && this.peek() === '\n') {
        break;
      }

      // Keep the backslash and the escaped character together
      if (this.peek() === '\\') {
        value += this.advance();
        if (this.isEOF()) {
          break;
        }
      }
      value += this.advance();
    }

    return value;
  }

  /**
   * True when the previous token can end an expression, making a following
   * `-` a binary operator rather than a sign
   */
  private followsOperand(): boolean {
    const type = this.lastToken?.type;
    return (
      type === TokenType.IDENTIFIER || type === TokenType.LITERAL || type === TokenType.CLOSE_GROUP
    );
  }

  private isCommentStart(): boolean {
    return this.match('//') || this.match('/*');
  }

  /**
   * Consume characters while predicate holds
   */
  private scanWhile(predicate: (char: string) => boolean): string {
    let value = '';
    while (!this.isEOF() && predicate(this.peek())) {
      value += this.advance();
    }
    return value;
  }

  /**
   * Consume a specific number of characters
   */
  private consumeChars(count: number): string {
    let value = '';
    for (let i = 0; i < count; i++) {
      value += this.advance();
    }
    return value;
  }

  /**
   * Create a token with the given type, value, and location
   */
  private createToken(type: TokenType, value: string, start: Position): Token {
    return {
      type,
      value,
      joint: false,
      spaced: false,
      loc: {
        start,
        end: this.getPosition(),
      },
    };
  }

  /**
   * Look ahead at next character without consuming it
   */
  peek(): string {
    if (this.isEOF()) {
      return '';
    }
    return this.input.charAt(this.index);
  }

  /**
   * Consume and return next character
   * Updates position tracking: line, column, and index
   * - Newlines increment line and reset column to 0
   * - Tabs advance column by tabWidth (default 4)
   * - Other characters advance column by 1
   */
  advance(): string {
    if (this.isEOF()) {
      return '';
    }

    const char = this.input.charAt(this.index);
    this.index++;

    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else if (char === '\t') {
      this.column += this.tabWidth;
    } else {
      this.column++;
    }

    return char;
  }

  /**
   * Check if next characters match the given string
   */
  match(str: string): boolean {
    return this.input.startsWith(str, this.index);
  }

  /**
   * Check if we've reached end of input
   */
  isEOF(): boolean {
    return this.index >= this.input.length;
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isIdentifierStart(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isIdentifierStart(char) || this.isDigit(char);
  }

  private isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r';
  }

  /**
   * Safely peek at character at specific offset from current position
   */
  private peekAt(offset: number): string {
    return this.input.charAt(this.index + offset);
  }

  /**
   * Get current position
   */
  private getPosition(): Position {
    return {
      line: this.line,
      column: this.column,
      index: this.index,
    };
  }

  /**
   * Create an EOF token at current position
   */
  private createEOFToken(spaced: boolean): Token {
    const pos = this.getPosition();
    return {
      type: TokenType.EOF,
      value: '',
      joint: false,
      spaced,
      loc: {
        start: pos,
        end: pos,
      },
    };
  }

  /**
   * Convenience method to tokenize an entire template string
   * @param template The template string to tokenize
   * @returns Array of all tokens including EOF token
   */
  tokenize(template: string): Token[] {
    this.setInput(template);
    const tokens: Token[] = [];

    let token = this.lex();
    while (token.type !== TokenType.EOF) {
      tokens.push(token);
      token = this.lex();
    }

    // Include EOF token
    tokens.push(token);

    return tokens;
  }
}
