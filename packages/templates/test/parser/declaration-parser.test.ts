import { describe, expect, test } from 'vitest';
import {
  DuplicateDeclarationError,
  RangeLimitError,
  TemplateSyntaxError,
  TypeMismatchError,
  UndeclaredVariableError,
} from '../../src/errors/expansion-error.js';
import { Lexer } from '../../src/lexer/lexer.js';
import {
  DeclarationParser,
  type DeclarationParserOptions,
} from '../../src/parser/declaration-parser.js';
import { TokenStream } from '../../src/parser/token-stream.js';
import type { VariableTable } from '../../src/parser/variable-table.js';

function declare(template: string, options: DeclarationParserOptions = {}) {
  const stream = new TokenStream(new Lexer().tokenize(template));
  const table = new DeclarationParser(options).parse(stream);
  return { table, stream };
}

function valuesOf(table: VariableTable, name: string): string[][] | undefined {
  return table.get(name)?.values.map((value) => value.map((token) => token.value));
}

describe('DeclarationParser', () => {
  describe('declaration region', () => {
    test('parses a value list', () => {
      const { table, stream } = declare('let &n = [1, 2, 3];');

      expect(valuesOf(table, 'n')).toEqual([['1'], ['2'], ['3']]);
      expect(stream.isEOF()).toBe(true);
    });

    test('stops at the first token that does not start a declaration', () => {
      const { table, stream } = declare('let &a = [x]; let &b = [y]; call *a;');

      expect(table.names()).toEqual(['a', 'b']);
      expect(stream.current.value).toBe('call');
    });

    test('treats let without & as body text', () => {
      const { table, stream } = declare('let x = 1;');

      expect(table.size).toBe(0);
      expect(stream.current.value).toBe('let');
    });

    test('returns a frozen table', () => {
      expect(declare('let &a = [1];').table.isFrozen()).toBe(true);
    });

    test('records the span of each declaration', () => {
      const { table } = declare('let &a = [1];\nlet &b = [2];');

      expect(table.get('b')?.loc).toEqual({
        start: { line: 2, column: 0, index: 14 },
        end: { line: 2, column: 13, index: 27 },
      });
    });
  });

  describe('value lists', () => {
    test('allows a trailing comma', () => {
      expect(valuesOf(declare('let &t = [a, b,];').table, 't')).toEqual([['a'], ['b']]);
    });

    test('unwraps braced multi-token values', () => {
      expect(valuesOf(declare('let &t = [{a b}, c];').table, 't')).toEqual([['a', 'b'], ['c']]);
    });

    test('keeps parentheses and brackets around a grouped value', () => {
      expect(valuesOf(declare('let &t = [(1, 2), [3]];').table, 't')).toEqual([
        ['(', '1', ',', '2', ')'],
        ['[', '3', ']'],
      ]);
    });

    test('keeps string and char literals as single values', () => {
      expect(valuesOf(declare(`let &s = ["a b", 'c'];`).table, 's')).toEqual([['"a b"'], ["'c'"]]);
    });

    test('reads NONE as an empty value', () => {
      expect(valuesOf(declare('let &t = [a, NONE];').table, 't')).toEqual([['a'], []]);
    });

    test('rejects an empty list', () => {
      expect(() => declare('let &t = [];')).toThrow(TemplateSyntaxError);
      expect(() => declare('let &t = [];')).toThrow('Value list must contain at least one value');
    });

    test('rejects an empty item', () => {
      expect(() => declare('let &t = [a,, b];')).toThrow('Empty value in list');
      expect(() => declare('let &t = [, a];')).toThrow('Empty value in list');
    });

    test('rejects an unclosed list', () => {
      expect(() => declare('let &t = [a, b')).toThrow("Unclosed '[': expected closing ']'");
    });

    test('rejects an unbraced multi-token item', () => {
      expect(() => declare('let &t = [a b];')).toThrow('Multi-token values must be wrapped in { }');
    });
  });

  describe('single values', () => {
    test('reads { ... } as one value', () => {
      expect(valuesOf(declare('let &t = {Vec<u8>};').table, 't')).toEqual([
        ['Vec', '<', 'u8', '>'],
      ]);
    });

    test('reads NONE as one empty value', () => {
      expect(valuesOf(declare('let &t = NONE;').table, 't')).toEqual([[]]);
    });

    test('clears the joint flag on the first token of a value', () => {
      const { table } = declare('let &t = [{~x}];');

      expect(table.get('t')?.values[0][0].joint).toBe(false);
    });
  });

  describe('ranges', () => {
    test('expands an exclusive range', () => {
      expect(valuesOf(declare('let &r = 0..3;').table, 'r')).toEqual([['0'], ['1'], ['2']]);
    });

    test('an inclusive range equals the written-out list', () => {
      const fromRange = valuesOf(declare('let &r = 0..=3;').table, 'r');
      const fromList = valuesOf(declare('let &r = [0, 1, 2, 3];').table, 'r');

      expect(fromRange).toEqual(fromList);
    });

    test('an exclusive range equals the written-out list', () => {
      const fromRange = valuesOf(declare('let &r = 0..3;').table, 'r');
      const fromList = valuesOf(declare('let &r = [0,1,2];').table, 'r');

      expect(fromRange).toEqual(fromList);
    });

    test('accepts a one-value inclusive range', () => {
      expect(valuesOf(declare('let &r = 3..=3;').table, 'r')).toEqual([['3']]);
    });

    test('rejects a descending range', () => {
      expect(() => declare('let &r = 5..2;')).toThrow(TypeMismatchError);
      expect(() => declare('let &r = 5..2;')).toThrow('Range 5..2 is descending');
    });

    test('rejects an empty range', () => {
      expect(() => declare('let &r = 3..3;')).toThrow('Range 3..3 contains no values');
    });

    test('rejects a bound that is not an unsigned integer', () => {
      expect(() => declare('let &r = a..3;')).toThrow("Range bound 'a' is not an unsigned integer");
      expect(() => declare('let &r = -1..3;')).toThrow("Range bound '-1' is not an unsigned integer");
    });

    test('rejects a bound beyond 64 bits', () => {
      expect(() => declare('let &r = 0..18446744073709551616;')).toThrow(
        "Range bound '18446744073709551616' does not fit in 64 bits",
      );
    });

    test('accepts bounds near the top of the 64-bit range', () => {
      const { table } = declare('let &r = 18446744073709551614..=18446744073709551615;');

      expect(valuesOf(table, 'r')).toEqual([['18446744073709551614'], ['18446744073709551615']]);
    });

    test('enforces a range length limit when one is set', () => {
      expect(() => declare('let &r = 0..10;', { maxRangeLength: 5 })).toThrow(RangeLimitError);
      expect(() => declare('let &r = 0..10;', { maxRangeLength: 5 })).toThrow(
        'Range 0..10 has 10 values, more than the limit of 5',
      );
      expect(valuesOf(declare('let &r = 0..5;', { maxRangeLength: 5 }).table, 'r')).toHaveLength(5);
    });

    test('has no range length limit by default', () => {
      expect(valuesOf(declare('let &r = 0..70000;').table, 'r')).toHaveLength(70000);
    });

    test('requires an upper bound', () => {
      expect(() => declare('let &r = 0..;')).toThrow('Expected an upper bound after range operator');
    });
  });

  describe('malformed declarations', () => {
    test('requires a name', () => {
      expect(() => declare('let & = [1];')).toThrow("Expected variable name after 'let &'");
    });

    test('requires =', () => {
      expect(() => declare('let &x [1];')).toThrow("Expected '=' after 'let &x'");
    });

    test('requires ;', () => {
      expect(() => declare('let &x = [1] body')).toThrow("Expected ';' after declaration of 'x'");
    });

    test('requires a value source', () => {
      expect(() => declare('let &x = foo;')).toThrow(
        "Expected a value list, { value }, range or NONE for 'x'",
      );
    });

    test('reports unbalanced groups in a value', () => {
      expect(() => declare('let &x = [(a];')).toThrow(TemplateSyntaxError);
    });
  });

  describe('references between declarations', () => {
    test('expands a reference to an earlier variable inside a value', () => {
      const { table } = declare('let &a = [1, 2]; let &b = [{x *a}];');

      expect(valuesOf(table, 'b')).toEqual([['x', '1', 'x', '2']]);
    });

    test('accepts a bare reference as a list item', () => {
      const { table } = declare('let &a = [1, 2]; let &b = [*a, 3];');

      expect(valuesOf(table, 'b')).toEqual([['1', '2'], ['3']]);
    });

    test('rejects a reference to a later variable', () => {
      expect(() => declare('let &b = [*a]; let &a = [1];')).toThrow(UndeclaredVariableError);
      expect(() => declare('let &b = [*a]; let &a = [1];')).toThrow(
        "Variable 'a' is not declared before use",
      );
    });

    test('rejects a redeclaration before reading its value', () => {
      expect(() => declare('let &a = [1]; let &a = [*missing];')).toThrow(DuplicateDeclarationError);
      expect(() => declare('let &a = [1]; let &a = [2];')).toThrow(
        "Variable 'a' is already declared (line 1)",
      );
    });

    test('reports an undeclared reference before an unbalanced group after it', () => {
      expect(() => declare('let &v = { *zz ) };')).toThrow(UndeclaredVariableError);
      expect(() => declare('let &v = [{ *zz ) }];')).toThrow(UndeclaredVariableError);
      expect(() => declare('let &v = [*zz, (];')).toThrow(UndeclaredVariableError);
    });

    test('reports an unbalanced group before an undeclared reference after it', () => {
      expect(() => declare('let &v = { ) *zz };')).toThrow(TemplateSyntaxError);
      expect(() => declare('let &v = [(], *zz];')).toThrow(TemplateSyntaxError);
    });
  });
});
