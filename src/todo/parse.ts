import { ParseError } from './errors.js';
import { lexTodo } from './lex.js';
import type {
  FormatConfig,
  Heading,
  InlineToken,
  LineToken,
  LineTokenType,
  Span,
  TodoFile,
  TodoState,
  UnderHeading,
} from './model.js';
import { resolveHandler, resolveTodoState } from './state.js';

/**
 * Recursive-descent parser from line tokens to a `TodoFile`.
 *
 * Grammar:
 * ```
 * File         := NEWLINE* (Heading NEWLINE*)*
 * Heading      := HEADING NEWLINE UnderHeading* (NEWLINE | EOF)
 * UnderHeading := Todo | Bullet | Text
 * Todo         := BRACKET_OPEN TodoState BRACKET_CLOSE TEXT (NEWLINE | EOF)
 * TodoState    := INSIDE
 * Bullet       := BULLET (NEWLINE | EOF)
 * Text         := TEXT (NEWLINE | EOF)
 * ```
 *
 * Rule choice is made by the `check*` predicates over the next one or two tokens;
 * nothing backtracks. Failures are never used to pick a rule: the first one aborts
 * the parse, and each rule it unwinds through appends its frame to the error.
 */
export type ParseResult = { ok: true; file: TodoFile } | { ok: false; error: ParseError };

/** Lookahead window: the next (up to) two tokens. */
export type Lookahead = readonly LineToken[];

export function checkHeading(window: Lookahead): boolean {
  return window[0]?.type === 'heading';
}

export function checkTodo(window: Lookahead): boolean {
  return window[0]?.type === 'bracketOpen';
}

export function checkTodoState(window: Lookahead): boolean {
  return window[0]?.type === 'inside' && window[1]?.type === 'bracketClose';
}

export function checkBullet(window: Lookahead): boolean {
  return window[0]?.type === 'bullet';
}

export function checkText(window: Lookahead): boolean {
  return window[0]?.type === 'text';
}

/**
 * The grammar's dispatch table, in the order a heading body tries its rules.
 */
export const GRAMMAR = {
  Todo: checkTodo,
  TodoState: checkTodoState,
  Bullet: checkBullet,
  Text: checkText,
  Heading: checkHeading,
} as const satisfies Record<string, (window: Lookahead) => boolean>;

const TOKEN_LABELS: Readonly<Record<LineTokenType, string>> = {
  heading: 'heading',
  bracketOpen: "'['",
  inside: 'todo state',
  bracketClose: "']'",
  bullet: 'bullet',
  text: 'text',
  newline: 'newline',
};

const HEADING_BODY_EXPECTED = [
  TOKEN_LABELS.bracketOpen,
  TOKEN_LABELS.bullet,
  TOKEN_LABELS.text,
  TOKEN_LABELS.newline,
];

class TokenStream {
  private index = 0;

  constructor(private readonly tokens: readonly LineToken[]) {}

  isEmpty(): boolean {
    return this.index >= this.tokens.length;
  }

  window(): Lookahead {
    return this.tokens.slice(this.index, this.index + 2);
  }

  shift(): LineToken | undefined {
    const token = this.tokens[this.index];
    if (token !== undefined) this.index += 1;
    return token;
  }

  /** Line of the next token, or of the last one once the stream is drained. */
  line(): number {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)]?.line ?? 1;
  }
}

function isTokenOfType<T extends LineTokenType>(
  token: LineToken,
  type: T
): token is Extract<LineToken, { type: T }> {
  return token.type === type;
}

function expectToken<T extends LineTokenType>(
  stream: TokenStream,
  type: T
): Extract<LineToken, { type: T }> {
  const line = stream.line();
  const token = stream.shift();
  if (token === undefined) {
    throw new ParseError({ kind: 'endOfInput', expected: [TOKEN_LABELS[type]] }, line);
  }
  if (!isTokenOfType(token, type)) {
    throw new ParseError(
      { kind: 'unexpectedToken', expected: [TOKEN_LABELS[type]], got: token },
      token.line
    );
  }
  return token;
}

/** Entries end at a newline, or at the end of the file. */
function expectLineEnd(stream: TokenStream): void {
  if (stream.isEmpty()) return;
  expectToken(stream, 'newline');
}

function withFrame<T>(rule: string, stream: TokenStream, parse: () => T): T {
  const line = stream.line();
  try {
    return parse();
  } catch (error) {
    if (error instanceof ParseError) error.pushFrame({ rule, line });
    throw error;
  }
}

function resolveSpans(tokens: InlineToken[], config: FormatConfig): Span[] {
  return tokens.map((token): Span => {
    switch (token.kind) {
      case 'normal':
        return token;
      case 'link':
        return {
          kind: 'link',
          name: token.name,
          handler: resolveHandler(token.handler, config),
          path: token.path,
        };
      case 'extra':
        return {
          kind: 'extra',
          delimiter: token.delimiter,
          children: resolveSpans(token.children, config),
        };
      default:
        return { kind: token.kind, children: resolveSpans(token.children, config) };
    }
  });
}

function parseTodoState(stream: TokenStream, config: FormatConfig): TodoState {
  return withFrame('TodoState', stream, () => {
    const inside = expectToken(stream, 'inside');
    return resolveTodoState(inside.text, config);
  });
}

function parseTodoEntry(stream: TokenStream, config: FormatConfig): UnderHeading {
  return withFrame('Todo', stream, () => {
    expectToken(stream, 'bracketOpen');
    const state: TodoState = checkTodoState(stream.window())
      ? parseTodoState(stream, config)
      : { kind: 'unset' };
    expectToken(stream, 'bracketClose');
    const description = expectToken(stream, 'text');
    expectLineEnd(stream);
    return { type: 'todo', state, description: resolveSpans(description.spans, config) };
  });
}

function parseBulletEntry(stream: TokenStream, config: FormatConfig): UnderHeading {
  return withFrame('Bullet', stream, () => {
    const bullet = expectToken(stream, 'bullet');
    expectLineEnd(stream);
    return { type: 'bullet', text: resolveSpans(bullet.spans, config) };
  });
}

function parseTextEntry(stream: TokenStream, config: FormatConfig): UnderHeading {
  return withFrame('Text', stream, () => {
    const text = expectToken(stream, 'text');
    expectLineEnd(stream);
    return { type: 'text', text: resolveSpans(text.spans, config) };
  });
}

function parseHeading(stream: TokenStream, config: FormatConfig): Heading {
  return withFrame('Heading', stream, () => {
    const heading = expectToken(stream, 'heading');
    expectToken(stream, 'newline');
    const body: UnderHeading[] = [];

    for (;;) {
      const window = stream.window();
      const next = window[0];
      if (next === undefined) break;
      if (next.type === 'newline') {
        stream.shift();
        break;
      }

      if (GRAMMAR.Todo(window)) {
        body.push(parseTodoEntry(stream, config));
      } else if (GRAMMAR.Bullet(window)) {
        body.push(parseBulletEntry(stream, config));
      } else if (GRAMMAR.Text(window)) {
        body.push(parseTextEntry(stream, config));
      } else if (GRAMMAR.Heading(window)) {
        throw new ParseError(
          { kind: 'structuralViolation', message: 'Heading cannot nest inside another heading' },
          next.line
        );
      } else {
        throw new ParseError(
          { kind: 'unexpectedToken', expected: HEADING_BODY_EXPECTED, got: next },
          next.line
        );
      }
    }

    return { name: heading.name, body };
  });
}

function parseFile(stream: TokenStream, config: FormatConfig): TodoFile {
  return withFrame('File', stream, () => {
    const headings: Heading[] = [];
    for (;;) {
      while (stream.window()[0]?.type === 'newline') stream.shift();
      if (stream.isEmpty()) break;
      headings.push(parseHeading(stream, config));
    }
    return { headings };
  });
}

/**
 * Parse line tokens into a document tree.
 *
 * Throws `ParseError` on the first failure; there is no partial result.
 */
export function parseTodoFile(tokens: readonly LineToken[], config: FormatConfig): TodoFile {
  return parseFile(new TokenStream(tokens), config);
}

/**
 * Non-throwing form of `parseTodoFile`.
 */
export function parseTodo(tokens: readonly LineToken[], config: FormatConfig): ParseResult {
  try {
    return { ok: true, file: parseTodoFile(tokens, config) };
  } catch (error) {
    if (error instanceof ParseError) return { ok: false, error };
    throw error;
  }
}

/**
 * Lex and parse a whole document.
 */
export function parseTodoText(text: string, config: FormatConfig): ParseResult {
  return parseTodo(lexTodo(text), config);
}
