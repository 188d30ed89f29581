import { BODY_INDENT, DEFAULT_BULLET_POINT, DEFAULT_WIDTH, KIND_DELIMITERS } from './constants.js';
import type { FormatConfig, Heading, Span, TodoFile, TodoState, UnderHeading } from './model.js';
import { canonicalStateText, displayStateText } from './state.js';

/**
 * Printer from a `TodoFile` back to text.
 *
 * Styles:
 * - `canonical`: the on-disk form. Parsing it again yields the same tree, so
 *   paragraphs stay on one line: a wrapped line could start with `#`, `-` or `[`
 *   and split a span.
 * - `display`: what `show` prints. State aliases, the default state, the bracket
 *   policy and the configured bullet point are applied, links show only their
 *   name and paragraphs wrap to the terminal.
 *
 * Printing never fails.
 */
export type PrintStyle = 'canonical' | 'display';

export interface PrintOptions {
  /** Terminal width; `display` paragraphs wrap at `width - 4`. */
  width?: number;
  style?: PrintStyle;
}

function printSpan(span: Span, style: PrintStyle): string {
  switch (span.kind) {
    case 'normal':
      return span.text;
    case 'verbatim':
    case 'underline':
    case 'crossed':
    case 'bold':
    case 'italic': {
      const delimiter = KIND_DELIMITERS[span.kind];
      return `${delimiter}${printSpans(span.children, style)}${delimiter}`;
    }
    case 'link':
      return style === 'canonical'
        ? `|${span.name}[${span.handler.name}:${span.path}]|`
        : `|${span.name}|`;
    case 'extra':
      return `${span.delimiter}${printSpans(span.children, style)}`;
  }
}

export function printSpans(spans: Span[], style: PrintStyle = 'canonical'): string {
  return spans.map((span) => printSpan(span, style)).join('');
}

/**
 * Text content with all markup removed (links keep their name, unterminated
 * delimiters stay literal).
 */
export function spansToPlainText(spans: Span[]): string {
  return spans
    .map((span): string => {
      switch (span.kind) {
        case 'normal':
          return span.text;
        case 'link':
          return span.name;
        case 'extra':
          return `${span.delimiter}${spansToPlainText(span.children)}`;
        default:
          return spansToPlainText(span.children);
      }
    })
    .join('');
}

/**
 * Greedy word wrap. Runs of whitespace collapse to one space; words longer than
 * `width` get a line of their own.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/)) {
    if (!word) continue;
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function printTodoLine(
  state: TodoState,
  description: Span[],
  config: FormatConfig,
  style: PrintStyle = 'canonical'
): string {
  let marker: string;
  if (style === 'canonical') {
    marker = `[${canonicalStateText(state)}]`;
  } else {
    const text = displayStateText(state, config);
    marker = (config.todoStateOps?.brackets ?? true) ? `[${text}]` : text;
  }
  const text = printSpans(description, style);
  return text ? `${marker} ${text}` : marker;
}

export function printBulletLine(
  text: Span[],
  config: FormatConfig,
  style: PrintStyle = 'canonical'
): string {
  const bullet =
    style === 'display' ? (config.bulletPoint ?? DEFAULT_BULLET_POINT) : DEFAULT_BULLET_POINT;
  const rendered = printSpans(text, style);
  return rendered ? `${bullet} ${rendered}` : bullet;
}

function printEntry(
  entry: UnderHeading,
  config: FormatConfig,
  style: PrintStyle,
  width: number
): string {
  switch (entry.type) {
    case 'todo':
      return `${BODY_INDENT}${printTodoLine(entry.state, entry.description, config, style)}\n`;
    case 'bullet':
      return `${BODY_INDENT}${printBulletLine(entry.text, config, style)}\n`;
    case 'text': {
      const text = printSpans(entry.text, style);
      if (style === 'canonical') return `${BODY_INDENT}${text}\n`;
      return wrapText(text, Math.max(width - BODY_INDENT.length, 1))
        .map((line) => `${BODY_INDENT}${line}\n`)
        .join('');
    }
  }
}

function printHeading(
  heading: Heading,
  config: FormatConfig,
  style: PrintStyle,
  width: number
): string {
  let title = heading.name;
  if (style === 'canonical') title = heading.name ? `# ${heading.name}` : '#';
  return `${title}\n${heading.body.map((entry) => printEntry(entry, config, style, width)).join('')}`;
}

/**
 * Print a whole file. Headings are separated by a blank line, which is also what
 * ends a heading body when the text is parsed again.
 */
export function printTodo(file: TodoFile, config: FormatConfig, options: PrintOptions = {}): string {
  const style = options.style ?? 'canonical';
  const width = options.width ?? DEFAULT_WIDTH;
  return file.headings.map((heading) => printHeading(heading, config, style, width)).join('\n');
}
