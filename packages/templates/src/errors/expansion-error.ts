import type { SourceLocation, Token } from '../lexer/token.js';

export type ErrorKind =
  | 'SyntaxError'
  | 'DuplicateDeclarationError'
  | 'UndeclaredVariableError'
  | 'TypeMismatchError'
  | 'RangeLimitError';

/**
 * Structured form of an error, suitable for reporting by a host tool
 */
export interface Diagnostic {
  kind: ErrorKind;
  message: string; // Without the position prefix; see span
  span: SourceLocation | null;
  context: string | null;
}

const CONTEXT_LIMIT = 50;

/**
 * Base class for every error raised while parsing or expanding a template.
 * Includes position information and context for debugging
 */
export abstract class ExpansionError extends Error {
  abstract readonly kind: ErrorKind;
  readonly reason: string;
  readonly loc: SourceLocation | null;
  readonly line: number;
  readonly column: number;
  readonly index: number;
  readonly context: string | null;

  constructor(message: string, loc: SourceLocation | null, context?: string | null) {
    const position = loc?.start;

    // Display 1-indexed column for user-facing error messages (editors show 1-indexed)
    const fullMessage = position
      ? `Error at line ${position.line}, column ${position.column + 1}: ${message}`
      : message;

    super(fullMessage);
    this.name = new.target.name;
    this.reason = message;
    this.loc = loc;

    // Store position information (using 0-indexed column internally)
    this.line = position?.line ?? 0;
    this.column = position?.column ?? 0;
    this.index = position?.index ?? 0;
    this.context = context ?? null;

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toDiagnostic(): Diagnostic {
    return {
      kind: this.kind,
      message: this.reason,
      span: this.loc,
      context: this.context,
    };
  }
}

/**
 * Malformed declaration, unterminated group or literal, mismatched brackets
 */
export class TemplateSyntaxError extends ExpansionError {
  readonly kind = 'SyntaxError';
}

/**
 * A `let` for a name already present in the variable table
 */
export class DuplicateDeclarationError extends ExpansionError {
  readonly kind = 'DuplicateDeclarationError';
}

/**
 * A reference to a name that has not been declared (yet)
 */
export class UndeclaredVariableError extends ExpansionError {
  readonly kind = 'UndeclaredVariableError';
}

/**
 * A range bound that is not an unsigned 64-bit integer, or a range with no values
 */
export class TypeMismatchError extends ExpansionError {
  readonly kind = 'TypeMismatchError';
}

/**
 * A range longer than the `maxRangeLength` the caller asked for
 */
export class RangeLimitError extends ExpansionError {
  readonly kind = 'RangeLimitError';
}

type ErrorConstructor<E extends ExpansionError> = new (
  message: string,
  loc: SourceLocation | null,
  context?: string | null,
) => E;

/**
 * Create an error with automatic context extraction from tokens
 */
export function errorAt<E extends ExpansionError>(
  ErrorClass: ErrorConstructor<E>,
  message: string,
  token: Token | null,
  contextTokens?: Token[],
): E {
  let context: string | null = null;

  if (contextTokens && contextTokens.length > 0) {
    // Build context from surrounding tokens
    context = contextTokens
      .map((t) => t.value || `[${t.type}]`)
      .join(' ')
      .slice(0, CONTEXT_LIMIT); // Limit context length

    if (context.length === CONTEXT_LIMIT) {
      context += '...';
    }
  } else if (token && token.value !== '') {
    context = token.value.slice(0, CONTEXT_LIMIT);
    if (token.value.length > CONTEXT_LIMIT) {
      context += '...';
    }
  }

  return new ErrorClass(message, token?.loc ?? null, context);
}
