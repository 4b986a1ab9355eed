/**
 * @kindred/templates - Main API
 *
 * Compile-time template expansion: declarations of multi-valued variables
 * followed by a body that is copied once per value, scope by scope.
 * Pure and synchronous; no state survives a call.
 */

import type { Logger } from '@kindred/logger';
import { ExpansionError, type Diagnostic } from './errors/expansion-error.js';
import { Expander } from './expander/expander.js';
import { Lexer } from './lexer/lexer.js';
import type { Token } from './lexer/token.js';
import type { Block } from './parser/ast-nodes.js';
import { BodyParser } from './parser/body-parser.js';
import { DeclarationParser } from './parser/declaration-parser.js';
import { TokenStream } from './parser/token-stream.js';
import type { VariableTable } from './parser/variable-table.js';
import { serialize } from './serializer/serializer.js';

/**
 * Options for parsing and rendering.
 */
export interface RenderOptions {
  /**
   * Receives debug entries as scopes are expanded.
   *
   * @example
   * ```typescript
   * render(template, { logger: createLogger({ environment: 'test' }) });
   * // {"level":"debug","event_type":"scope_expanded","metadata":{"factor":3,...}}
   * ```
   */
  logger?: Logger;

  /**
   * Largest number of values a `low..high` range may produce. Unlimited when
   * unset; a longer range raises a `RangeLimitError`.
   */
  maxRangeLength?: number;
}

/**
 * A template split into its variable table and body.
 */
export interface ParsedTemplate {
  variables: VariableTable;
  body: Block;
}

/**
 * Parsed template that can be rendered without re-parsing.
 */
export interface CompiledTemplate extends ParsedTemplate {
  /**
   * Expand and serialize the template body.
   *
   * @returns The expanded text
   */
  render(): string;
}

export type RenderResult = { ok: true; output: string } | { ok: false; diagnostic: Diagnostic };

/**
 * Split template text into tokens (EOF token included).
 */
export function tokenize(template: string): Token[] {
  return new Lexer().tokenize(template);
}

/**
 * Parse template text into its variable table and body Block.
 *
 * @throws {ExpansionError} On the first syntax, declaration or reference error
 */
export function parse(template: string, options: RenderOptions = {}): ParsedTemplate {
  // Tokens are lexed as the parsers reach them
  const lexer = new Lexer();
  lexer.setInput(template);
  const stream = new TokenStream(lexer);
  const variables = new DeclarationParser(options).parse(stream);
  const body = new BodyParser(variables).parse(stream);
  return { variables, body };
}

/**
 * Expand a parsed body against its variables and serialize the result.
 *
 * @throws {UndeclaredVariableError} If the body references a name missing from the table
 */
export function expandAndRender(
  variables: VariableTable,
  body: Block,
  options: RenderOptions = {},
): string {
  const expander = new Expander(variables, { logger: options.logger });
  return serialize(expander.expand(body));
}

/**
 * Compile a template into a reusable compiled template.
 *
 * @example
 * ```typescript
 * const compiled = compile('let &n = [1, 2]; call *n;');
 * compiled.variables.get('n')?.values.length; // 2
 * compiled.render(); // 'call 1 ; call 2 ;'
 * ```
 */
export function compile(template: string, options: RenderOptions = {}): CompiledTemplate {
  const { variables, body } = parse(template, options);

  return {
    variables,
    body,
    render(): string {
      return expandAndRender(variables, body, options);
    },
  };
}

/**
 * Render template text in one step.
 *
 * @example
 * ```typescript
 * render('let &ty = [i32, u32]; impl Zero for *ty {}');
 * // 'impl Zero for i32 { } impl Zero for u32 { }'
 * ```
 *
 * @throws {ExpansionError} On any error; no partial output is produced
 */
export function render(template: string, options: RenderOptions = {}): string {
  return compile(template, options).render();
}

/**
 * Render template text, reporting failure as a structured diagnostic instead of throwing.
 */
export function tryRender(template: string, options: RenderOptions = {}): RenderResult {
  try {
    return { ok: true, output: render(template, options) };
  } catch (error) {
    if (error instanceof ExpansionError) {
      return { ok: false, diagnostic: error.toDiagnostic() };
    }
    throw error;
  }
}

// Re-export types for convenience
export type { ErrorKind, Diagnostic } from './errors/expansion-error.js';
export type { Position, SourceLocation, Token } from './lexer/token.js';
export type { Delimiter } from './lexer/token-types.js';
export type {
  Block,
  ChildBlock,
  InterpolatedLiteral,
  Statement,
  TokenNode,
  VariableRef,
} from './parser/ast-nodes.js';
export type { Value, Variable } from './parser/variable-table.js';
export type { ExpandedBlock, ExpandedNode } from './expander/expanded-nodes.js';

export {
  DuplicateDeclarationError,
  ExpansionError,
  RangeLimitError,
  TemplateSyntaxError,
  TypeMismatchError,
  UndeclaredVariableError,
} from './errors/expansion-error.js';
export { TokenType } from './lexer/token-types.js';
export { Lexer } from './lexer/lexer.js';
export { VariableTable } from './parser/variable-table.js';
export { Expander } from './expander/expander.js';
export { directRefs, duplicationFactor } from './expander/scope-resolver.js';
export { serialize } from './serializer/serializer.js';
