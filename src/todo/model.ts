/**
 * Token and document types for `.todo` files.
 *
 * Notes:
 * - Line numbers are 1-based, matching what editors show.
 * - Inline markup is a closed union on `kind`; consumers switch over it exhaustively.
 */

/** Delimiters that open (and close) a styled inline span. */
export type StyleDelimiter = '`' | '_' | '-' | '*' | '/';

/** Every character with inline meaning, including the link marker. */
export type InlineDelimiter = StyleDelimiter | '|';

export type StyleKind = 'verbatim' | 'underline' | 'crossed' | 'bold' | 'italic';

/** Inline markup as produced by the lexer (link handlers are raw names). */
export type InlineToken =
  | { kind: 'normal'; text: string }
  | { kind: StyleKind; children: InlineToken[] }
  | { kind: 'link'; name: string; handler: string; path: string }
  | { kind: 'extra'; delimiter: InlineDelimiter; children: InlineToken[] };

export type HandlerRef =
  | { kind: 'known'; name: string }
  | { kind: 'unknown'; name: string };

/** Inline markup inside the document tree (link handlers are classified). */
export type Span =
  | { kind: 'normal'; text: string }
  | { kind: StyleKind; children: Span[] }
  | { kind: 'link'; name: string; handler: HandlerRef; path: string }
  | { kind: 'extra'; delimiter: InlineDelimiter; children: Span[] };

export type LineToken =
  | { type: 'heading'; name: string; line: number }
  | { type: 'bracketOpen'; line: number }
  | { type: 'inside'; text: string; line: number }
  | { type: 'bracketClose'; line: number }
  | { type: 'bullet'; spans: InlineToken[]; line: number }
  | { type: 'text'; spans: InlineToken[]; line: number }
  | { type: 'newline'; line: number };

export type LineTokenType = LineToken['type'];

export type TodoState =
  /** Raw bracket text matched a configured alias. */
  | { kind: 'defined'; raw: string; value: string }
  /** No alias matched; `value` is the raw bracket text. */
  | { kind: 'other'; value: string }
  /** Empty brackets: the printer falls back to the default state. */
  | { kind: 'unset' };

export type UnderHeading =
  | { type: 'todo'; state: TodoState; description: Span[] }
  | { type: 'bullet'; text: Span[] }
  | { type: 'text'; text: Span[] };

export interface Heading {
  name: string;
  body: UnderHeading[];
}

export interface TodoFile {
  headings: Heading[];
}

/**
 * Read-only formatting configuration shared by parser and printer.
 *
 * Callers derive it once per invocation (see `toFormatConfig`).
 */
export interface FormatConfig {
  /** Raw bracket text -> display text. */
  todoState: Readonly<Record<string, string>>;
  todoStateOps?: { default: string; brackets: boolean };
  bulletPoint?: string;
  /** Link handler names the caller knows how to dispatch. */
  handlers: readonly string[];
}

export const EMPTY_FORMAT_CONFIG: FormatConfig = { todoState: {}, handlers: [] };
