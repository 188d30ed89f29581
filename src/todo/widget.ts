import type { FormatConfig, Span, StyleKind, TodoFile } from './model.js';
import { displayStateText } from './state.js';

/**
 * Widget-markup export for desktop status widgets.
 *
 * Each todo becomes `{ state, description }` where `description` holds one
 * s-expression per top-level span. Styled spans become boxes, links become buttons
 * that call back into the CLI's `links open-raw` command.
 */
export interface WidgetTodo {
  state: string;
  description: string[];
}

export interface WidgetOptions {
  /** Command line used by link buttons, e.g. `daytodo` or `daytodo --config ~/x.json`. */
  command?: string;
}

const SPAN_STYLES: Readonly<Record<StyleKind, string>> = {
  verbatim: 'color: #c3e88d;',
  underline: 'text-decoration: underline;',
  crossed: 'text-decoration: line-through;',
  bold: 'font-weight: bold;',
  italic: 'font-style: italic;',
};

const LINK_LABEL_STYLE = 'text-decoration: underline; text-decoration-color: #ff5370;';

/**
 * Quote a string literal for the widget markup.
 */
export function quoteWidgetString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Quote a value as one POSIX shell word. Link handlers and paths come from the
 * todo file and end up in the `onclick` command line.
 */
export function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function spanToWidget(span: Span, command = 'daytodo'): string {
  const children = (spans: Span[]): string => spans.map((child) => spanToWidget(child, command)).join('');

  switch (span.kind) {
    case 'normal':
      return `(label :halign "start" :text ${quoteWidgetString(span.text)})`;
    case 'verbatim':
    case 'underline':
    case 'crossed':
    case 'bold':
    case 'italic':
      return `(box :style "${SPAN_STYLES[span.kind]}" :halign "start" ${children(span.children)})`;
    case 'link': {
      const onclick =
        `${command} links open-raw ` +
        `${quoteShellArg(span.handler.name)} ${quoteShellArg(span.path)} &`;
      return (
        `(button :style "all: unset" :onclick ${quoteWidgetString(onclick)} :halign "start" ` +
        `(label :style "${LINK_LABEL_STYLE}" :halign "start" :text ${quoteWidgetString(span.name)}))`
      );
    }
    case 'extra':
      return (
        `(box :space-evenly false :halign "start" ` +
        `(label :halign "start" :text ${quoteWidgetString(span.delimiter)}) ${children(span.children)})`
      );
  }
}

/**
 * Collect every todo (across all headings) as widget entries.
 */
export function buildWidgetTodos(
  file: TodoFile,
  config: FormatConfig,
  options: WidgetOptions = {}
): WidgetTodo[] {
  const command = options.command ?? 'daytodo';
  const out: WidgetTodo[] = [];
  for (const heading of file.headings) {
    for (const entry of heading.body) {
      if (entry.type !== 'todo') continue;
      out.push({
        state: displayStateText(entry.state, config),
        description: entry.description.map((span) => spanToWidget(span, command)),
      });
    }
  }
  return out;
}
