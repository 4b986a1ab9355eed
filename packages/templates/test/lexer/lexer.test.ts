import { beforeEach, describe, expect, test } from 'vitest';
import { TemplateSyntaxError } from '../../src/errors/expansion-error.js';
import { Lexer } from '../../src/lexer/lexer.js';
import type { Token } from '../../src/lexer/token.js';
import { TokenType } from '../../src/lexer/token-types.js';

const values = (tokens: Token[]) => tokens.filter((t) => t.type !== TokenType.EOF).map((t) => t.value);

describe('Lexer', () => {
  let lexer: Lexer;

  beforeEach(() => {
    lexer = new Lexer();
  });

  describe('tokenize()', () => {
    test('returns only EOF for empty input', () => {
      const tokens = lexer.tokenize('');

      expect(tokens).toHaveLength(1);
      expect(tokens[0].type).toBe(TokenType.EOF);
      expect(tokens[0].value).toBe('');
    });

    test('returns only EOF for whitespace and comments', () => {
      const tokens = lexer.tokenize('  // nothing here\n /* or here */ ');

      expect(tokens).toHaveLength(1);
      expect(tokens[0].type).toBe(TokenType.EOF);
      expect(tokens[0].spaced).toBe(true);
    });

    test('classifies a declaration', () => {
      const tokens = lexer.tokenize('let &n = [1, 2];');

      expect(tokens.map((t) => t.type)).toEqual([
        TokenType.IDENTIFIER,
        TokenType.PUNCT,
        TokenType.IDENTIFIER,
        TokenType.PUNCT,
        TokenType.OPEN_GROUP,
        TokenType.LITERAL,
        TokenType.PUNCT,
        TokenType.LITERAL,
        TokenType.CLOSE_GROUP,
        TokenType.PUNCT,
        TokenType.EOF,
      ]);
      expect(values(tokens)).toEqual(['let', '&', 'n', '=', '[', '1', ',', '2', ']', ';']);
    });

    test('records delimiter kinds on group tokens', () => {
      const tokens = lexer.tokenize('{ ( [ ] ) }');

      expect(tokens.slice(0, 6).map((t) => t.delimiter)).toEqual([
        'brace',
        'paren',
        'bracket',
        'bracket',
        'paren',
        'brace',
      ]);
    });

    test('emits one token per punctuation character', () => {
      expect(values(lexer.tokenize('a::b'))).toEqual(['a', ':', ':', 'b']);
    });
  });

  describe('spacing', () => {
    test('marks tokens preceded by whitespace as spaced', () => {
      const tokens = lexer.tokenize('a b(c)');

      expect(tokens.slice(0, 5).map((t) => t.spaced)).toEqual([false, true, false, false, false]);
    });

    test('glues punctuation written without whitespace', () => {
      const tokens = lexer.tokenize('a += b => c');

      expect(values(tokens)).toEqual(['a', '+', '=', 'b', '=', '>', 'c']);
      expect(tokens.slice(0, 7).map((t) => t.joint)).toEqual([
        false,
        false,
        true,
        false,
        false,
        true,
        false,
      ]);
    });

    test('glues an identifier written against punctuation', () => {
      const tokens = lexer.tokenize('&mut x');

      expect(tokens[1].value).toBe('mut');
      expect(tokens[1].joint).toBe(true);
      expect(tokens[2].joint).toBe(false);
    });

    test('does not glue tokens after identifiers or groups', () => {
      const tokens = lexer.tokenize('f(x);');

      expect(tokens.slice(0, 5).map((t) => t.joint)).toEqual([false, false, false, false, false]);
    });
  });

  describe('joint modifier', () => {
    test('marks the following token as joint', () => {
      const tokens = lexer.tokenize('_ ~x');

      expect(values(tokens)).toEqual(['_', 'x']);
      expect(tokens[1].joint).toBe(true);
      expect(tokens[1].spaced).toBe(true);
    });

    test('accepts repeated markers', () => {
      const tokens = lexer.tokenize('a ~~b');

      expect(values(tokens)).toEqual(['a', 'b']);
      expect(tokens[1].joint).toBe(true);
    });

    test('rejects a marker followed by whitespace', () => {
      expect(() => lexer.tokenize('a ~ b')).toThrow(TemplateSyntaxError);
      expect(() => lexer.tokenize('a ~ b')).toThrow(
        "Joint modifier '~' must be immediately followed by a token",
      );
    });

    test('rejects a marker at end of input', () => {
      expect(() => lexer.tokenize('a ~')).toThrow(TemplateSyntaxError);
    });

    test('rejects a marker followed by a comment', () => {
      expect(() => lexer.tokenize('a ~// note')).toThrow(TemplateSyntaxError);
    });
  });

  describe('numbers', () => {
    test.each([
      ['42', '42'],
      ['1.5', '1.5'],
      ['0xff', '0xff'],
      ['10u64', '10u64'],
      ['1_000', '1_000'],
      ['1e-9', '1e-9'],
      ['2.5E+3', '2.5E+3'],
      ['1.', '1.'],
    ])('scans %s as one literal', (input, expected) => {
      const tokens = lexer.tokenize(input);

      expect(tokens).toHaveLength(2);
      expect(tokens[0].type).toBe(TokenType.LITERAL);
      expect(tokens[0].value).toBe(expected);
    });

    test('scans a negative literal where no operand precedes', () => {
      const tokens = lexer.tokenize('[-1, = -2]');

      expect(values(tokens)).toEqual(['[', '-1', ',', '=', '-2', ']']);
      expect(tokens[1].type).toBe(TokenType.LITERAL);
      expect(tokens[4].type).toBe(TokenType.LITERAL);
    });

    test('treats minus after an operand as an operator', () => {
      const tokens = lexer.tokenize('a -1');

      expect(values(tokens)).toEqual(['a', '-', '1']);
      expect(tokens[1].type).toBe(TokenType.PUNCT);
      expect(tokens[2].joint).toBe(true);
    });

    test('stops before a range operator', () => {
      const tokens = lexer.tokenize('0..3');

      expect(values(tokens)).toEqual(['0', '.', '.', '3']);
      expect(tokens.slice(0, 4).map((t) => t.joint)).toEqual([false, false, true, true]);
    });

    test('does not read a fraction after a field access dot', () => {
      expect(values(lexer.tokenize('t.0.1'))).toEqual(['t', '.', '0', '.', '1']);
    });

    test('does not read a trailing dot before a method call', () => {
      expect(values(lexer.tokenize('1.max(2)'))).toEqual(['1', '.', 'max', '(', '2', ')']);
    });
  });

  describe('strings and chars', () => {
    test('keeps string literals verbatim', () => {
      const tokens = lexer.tokenize('"a \\"b\\" c"');

      expect(tokens).toHaveLength(2);
      expect(tokens[0].type).toBe(TokenType.LITERAL);
      expect(tokens[0].value).toBe('"a \\"b\\" c"');
    });

    test('scans prefixed strings as one literal', () => {
      expect(values(lexer.tokenize('b"bytes" c"text" r"raw"'))).toEqual([
        'b"bytes"',
        'c"text"',
        'r"raw"',
      ]);
    });

    test('scans raw strings with hashes', () => {
      const tokens = lexer.tokenize('r#"say "hi""#');

      expect(tokens[0].type).toBe(TokenType.LITERAL);
      expect(tokens[0].value).toBe('r#"say "hi""#');
    });

    test('keeps an identifier named like a prefix', () => {
      const tokens = lexer.tokenize('r + b');

      expect(tokens.map((t) => t.type)).toEqual([
        TokenType.IDENTIFIER,
        TokenType.PUNCT,
        TokenType.IDENTIFIER,
        TokenType.EOF,
      ]);
    });

    test('scans a raw identifier as one identifier', () => {
      const tokens = lexer.tokenize('let r#type = 1;');

      expect(values(tokens)).toEqual(['let', 'r#type', '=', '1', ';']);
      expect(tokens[1].type).toBe(TokenType.IDENTIFIER);
      expect(tokens[1].loc).toEqual({
        start: { line: 1, column: 4, index: 4 },
        end: { line: 1, column: 10, index: 10 },
      });
    });

    test('keeps r followed by # and punctuation as separate tokens', () => {
      const tokens = lexer.tokenize('r#!');

      expect(values(tokens)).toEqual(['r', '#', '!']);
      expect(tokens[0].type).toBe(TokenType.IDENTIFIER);
    });

    test('scans char literals', () => {
      expect(values(lexer.tokenize("'a' '\\n' b'x'"))).toEqual(["'a'", "'\\n'", "b'x'"]);
    });

    test('treats a lone quote as punctuation', () => {
      const tokens = lexer.tokenize("&'a str");

      expect(values(tokens)).toEqual(['&', "'", 'a', 'str']);
      expect(tokens[1].type).toBe(TokenType.PUNCT);
    });

    test('rejects an unclosed string', () => {
      expect(() => lexer.tokenize('x = "abc')).toThrow('Unclosed string: expected closing "');
    });

    test('rejects an unclosed raw string', () => {
      expect(() => lexer.tokenize('r#"abc"')).toThrow('Unclosed string: expected closing "#');
    });

    test('rejects an unclosed escaped char', () => {
      expect(() => lexer.tokenize("'\\n")).toThrow(TemplateSyntaxError);
    });
  });

  describe('comments', () => {
    test('skips line comments', () => {
      const tokens = lexer.tokenize('a // comment\nb');

      expect(values(tokens)).toEqual(['a', 'b']);
      expect(tokens[1].spaced).toBe(true);
    });

    test('skips nested block comments', () => {
      expect(values(lexer.tokenize('a /* x /* y */ z */ b'))).toEqual(['a', 'b']);
    });

    test('rejects an unclosed block comment', () => {
      expect(() => lexer.tokenize('a /* x /* y */')).toThrow(
        "Unclosed block comment: expected closing '*/'",
      );
    });
  });

  describe('positions', () => {
    test('tracks line, column and index', () => {
      const tokens = lexer.tokenize('a\n  bc');

      expect(tokens[1].loc).toEqual({
        start: { line: 2, column: 2, index: 4 },
        end: { line: 2, column: 4, index: 6 },
      });
    });

    test('counts a tab as four columns', () => {
      const tokens = lexer.tokenize('\tx');

      expect(tokens[0].loc?.start).toEqual({ line: 1, column: 4, index: 1 });
    });

    test('reports the position of a lexing error', () => {
      try {
        lexer.tokenize('ok\n  "open');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TemplateSyntaxError);
        expect(error).toMatchObject({ line: 2, column: 2 });
      }
    });
  });

  describe('lex()', () => {
    test('returns tokens one at a time', () => {
      lexer.setInput('a b');

      expect(lexer.lex().value).toBe('a');
      expect(lexer.lex().value).toBe('b');
      expect(lexer.lex().type).toBe(TokenType.EOF);
    });

    test('setInput resets state', () => {
      lexer.tokenize('first');
      const tokens = lexer.tokenize('x');

      expect(tokens[0].loc?.start).toEqual({ line: 1, column: 0, index: 0 });
    });
  });
});
