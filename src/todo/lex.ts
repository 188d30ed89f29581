import {
  LINK_HANDLER_CLOSE,
  LINK_HANDLER_OPEN,
  LINK_MARKER,
  LINK_PATH_SEPARATOR,
  STYLE_DELIMITERS,
} from './constants.js';
import type { InlineToken, LineToken, StyleDelimiter } from './model.js';

/**
 * Lexer for `.todo` files.
 *
 * Two layers:
 * - line level: headings, todo brackets, bullets, paragraph text and newlines,
 *   dispatched on the first non-blank character of each line
 * - inline level: paired style delimiters and `|name[handler:path]|` links
 *
 * The lexer never fails. Markup that does not close before the end of its line
 * becomes an `extra` span that keeps the literal delimiter, so printing the spans
 * back always reproduces the source text.
 */

/**
 * Character cursor over the whole source.
 *
 * Tracks the 1-based line number so tokens can point back at their source line.
 */
class Cursor {
  private index = 0;
  line = 1;

  constructor(private readonly text: string) {}

  peek(offset = 0): string | undefined {
    return this.text[this.index + offset];
  }

  advance(): string | undefined {
    const ch = this.text[this.index];
    if (ch === undefined) return undefined;
    this.index += 1;
    if (ch === '\n') this.line += 1;
    return ch;
  }

  /** Consume and return characters while `predicate` holds (never crosses end of input). */
  takeWhile(predicate: (ch: string) => boolean): string {
    const start = this.index;
    while (this.index < this.text.length) {
      const ch = this.text[this.index];
      if (ch === undefined || !predicate(ch)) break;
      this.index += 1;
      if (ch === '\n') this.line += 1;
    }
    return this.text.slice(start, this.index);
  }

  skipBlanks(): void {
    this.takeWhile(isBlank);
  }

  atLineEnd(): boolean {
    const ch = this.peek();
    return ch === undefined || ch === '\n';
  }

  /** True if `ch` appears before the end of the current line. */
  lineContains(ch: string): boolean {
    for (let offset = 0; ; offset += 1) {
      const next = this.peek(offset);
      if (next === undefined || next === '\n') return false;
      if (next === ch) return true;
    }
  }
}

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

function isStyleDelimiter(ch: string | undefined): ch is StyleDelimiter {
  return ch !== undefined && Object.hasOwn(STYLE_DELIMITERS, ch);
}

function isInlineSpecial(ch: string): boolean {
  return ch === '\n' || ch === LINK_MARKER || isStyleDelimiter(ch);
}

/**
 * Lex a whole document into line tokens.
 *
 * `\r\n` line endings are read as `\n`. Empty input yields no tokens.
 */
export function lexTodo(source: string): LineToken[] {
  const cursor = new Cursor(source.replace(/\r\n/g, '\n'));
  const tokens: LineToken[] = [];

  for (;;) {
    cursor.skipBlanks();
    const ch = cursor.peek();
    if (ch === undefined) break;
    const line = cursor.line;

    if (ch === '\n') {
      cursor.advance();
      tokens.push({ type: 'newline', line });
      continue;
    }

    if (ch === '#') {
      cursor.advance();
      cursor.skipBlanks();
      const name = cursor.takeWhile((next) => next !== '\n').trimEnd();
      cursor.advance();
      tokens.push({ type: 'heading', name, line }, { type: 'newline', line });
      continue;
    }

    if (ch === LINK_HANDLER_OPEN && cursor.lineContains(LINK_HANDLER_CLOSE)) {
      cursor.advance();
      tokens.push({ type: 'bracketOpen', line });
      cursor.skipBlanks();
      const text = cursor.takeWhile((next) => next !== LINK_HANDLER_CLOSE);
      cursor.advance();
      tokens.push({ type: 'inside', text, line }, { type: 'bracketClose', line });
      cursor.skipBlanks();
      tokens.push({ type: 'text', spans: lexInline(cursor), line });
      continue;
    }

    if (ch === '-') {
      cursor.advance();
      cursor.skipBlanks();
      tokens.push({ type: 'bullet', spans: lexInline(cursor), line });
      continue;
    }

    tokens.push({ type: 'text', spans: lexInline(cursor), line });
  }

  return tokens;
}

/**
 * Lex inline markup up to (not including) the next newline.
 */
function lexInline(cursor: Cursor): InlineToken[] {
  const spans: InlineToken[] = [];
  while (!cursor.atLineEnd()) spans.push(lexSpan(cursor));
  return spans;
}

/**
 * Lex exactly one span. Callers guarantee the cursor is not at a line end.
 */
function lexSpan(cursor: Cursor): InlineToken {
  const ch = cursor.peek();
  if (isStyleDelimiter(ch)) return lexStyled(cursor, ch);
  if (ch === LINK_MARKER) return lexLink(cursor);
  return { kind: 'normal', text: cursor.takeWhile((next) => !isInlineSpecial(next)) };
}

/**
 * Lex a span opened by `delimiter`.
 *
 * Children are lexed until the same delimiter closes the span. Reaching the end of
 * the line first yields `extra` with whatever was lexed so far.
 */
function lexStyled(cursor: Cursor, delimiter: StyleDelimiter): InlineToken {
  cursor.advance();
  const children: InlineToken[] = [];

  for (;;) {
    if (cursor.atLineEnd()) return { kind: 'extra', delimiter, children };
    if (cursor.peek() === delimiter) {
      cursor.advance();
      return { kind: STYLE_DELIMITERS[delimiter], children };
    }
    children.push(lexSpan(cursor));
  }
}

interface ScannedLink {
  name: string;
  handler: string;
  path: string;
  /** Characters from the opening `|` through the closing `|`. */
  length: number;
}

/**
 * Look ahead for `|name[handler:path]|` without consuming anything.
 *
 * Each piece must appear in order before a newline or another `|`, and the
 * closing `|` must follow `]` immediately.
 */
function scanLink(cursor: Cursor): ScannedLink | undefined {
  let offset = 1;

  function takeUntil(stop: string): string | undefined {
    let text = '';
    for (;;) {
      const ch = cursor.peek(offset);
      if (ch === undefined || ch === '\n' || ch === LINK_MARKER) return undefined;
      offset += 1;
      if (ch === stop) return text;
      text += ch;
    }
  }

  const name = takeUntil(LINK_HANDLER_OPEN);
  if (name === undefined) return undefined;
  const handler = takeUntil(LINK_PATH_SEPARATOR);
  if (handler === undefined) return undefined;
  const path = takeUntil(LINK_HANDLER_CLOSE);
  if (path === undefined) return undefined;
  if (cursor.peek(offset) !== LINK_MARKER) return undefined;

  return { name, handler, path, length: offset + 1 };
}

/**
 * A `|` that does not open a complete link keeps only the next span as its child,
 * so an enclosing styled span can still close.
 */
function lexLink(cursor: Cursor): InlineToken {
  const link = scanLink(cursor);
  if (link) {
    for (let index = 0; index < link.length; index += 1) cursor.advance();
    return { kind: 'link', name: link.name, handler: link.handler, path: link.path };
  }

  cursor.advance();
  return {
    kind: 'extra',
    delimiter: LINK_MARKER,
    children: cursor.atLineEnd() ? [] : [lexSpan(cursor)],
  };
}
