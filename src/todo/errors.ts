import type { Diagnostic } from './diagnostics.js';
import { errorDiagnostic } from './diagnostics.js';
import type { InlineToken, LineToken } from './model.js';

/**
 * Parse failures and their rule-frame stack.
 *
 * A `ParseError` is created once, at the innermost failing rule, with a single
 * terminal cause. Each enclosing rule appends its own frame while the error
 * unwinds, so `frames` is ordered innermost first and `format()` prints it in
 * that order.
 */
export type ParseFailure =
  | { kind: 'unexpectedToken'; expected: string[]; got: LineToken }
  | { kind: 'endOfInput'; expected: string[] }
  | { kind: 'structuralViolation'; message: string };

export interface ParseFrame {
  rule: string;
  /** Source line the rule started at. */
  line: number;
}

export type ParseErrorCode = 'UNEXPECTED_TOKEN' | 'END_OF_INPUT' | 'NESTED_HEADING';

function inlinePreview(spans: InlineToken[]): string {
  const text = spans
    .map((span): string => {
      switch (span.kind) {
        case 'normal':
          return span.text;
        case 'link':
          return span.name;
        default:
          return inlinePreview(span.children);
      }
    })
    .join('');
  return text.length > 24 ? `${text.slice(0, 24)}...` : text;
}

/**
 * Human-readable name of a token, used in "expected ..., got ..." messages.
 */
export function describeToken(token: LineToken): string {
  switch (token.type) {
    case 'heading':
      return `heading ${JSON.stringify(token.name)}`;
    case 'inside':
      return `todo state ${JSON.stringify(token.text)}`;
    case 'bullet':
      return `bullet ${JSON.stringify(inlinePreview(token.spans))}`;
    case 'text':
      return `text ${JSON.stringify(inlinePreview(token.spans))}`;
    case 'bracketOpen':
      return "'['";
    case 'bracketClose':
      return "']'";
    case 'newline':
      return 'newline';
  }
}

function failureMessage(failure: ParseFailure): string {
  switch (failure.kind) {
    case 'unexpectedToken':
      return `Expected one of [${failure.expected.join(', ')}], got ${describeToken(failure.got)}`;
    case 'endOfInput':
      return `No tokens left (expected one of [${failure.expected.join(', ')}])`;
    case 'structuralViolation':
      return failure.message;
  }
}

function failureCode(failure: ParseFailure): ParseErrorCode {
  switch (failure.kind) {
    case 'unexpectedToken':
      return 'UNEXPECTED_TOKEN';
    case 'endOfInput':
      return 'END_OF_INPUT';
    case 'structuralViolation':
      return 'NESTED_HEADING';
  }
}

export class ParseError extends Error {
  readonly code: ParseErrorCode;
  readonly frames: ParseFrame[] = [];

  constructor(readonly failure: ParseFailure, readonly line?: number) {
    super(failureMessage(failure));
    this.name = 'ParseError';
    this.code = failureCode(failure);
  }

  pushFrame(frame: ParseFrame): void {
    this.frames.push(frame);
  }

  /**
   * Render the cause followed by the rule path, innermost rule first.
   *
   * Example:
   * ```
   * Heading cannot nest inside another heading (line 3)
   *   at Heading (line 1)
   *   at File (line 1)
   * ```
   */
  format(): string {
    const cause = this.line === undefined ? this.message : `${this.message} (line ${this.line})`;
    return [cause, ...this.frames.map((frame) => `  at ${frame.rule} (line ${frame.line})`)].join(
      '\n'
    );
  }

  toDiagnostic(): Diagnostic {
    return errorDiagnostic(this.code, this.format(), this.line);
  }
}

/**
 * Raised when a link names a handler that has no registered implementation, or
 * when the handler itself fails. Only the single dispatch fails.
 */
export class HandlerDispatchError extends Error {
  constructor(
    readonly code: 'UNKNOWN_HANDLER' | 'HANDLER_FAILED',
    readonly handler: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HandlerDispatchError';
  }
}
