import type { FormatConfig, Span, TodoFile, TodoState, UnderHeading } from './model.js';
import { spansToPlainText } from './print.js';
import { displayStateText } from './state.js';

/**
 * View/presentation helpers for parsed todo files.
 *
 * The document tree is already JSON-safe, but tool/CLI output should not depend on its
 * internal shape, so these helpers translate it into stable field names:
 * - headings carry `name` and `entries`
 * - entries are tagged `todo | bullet | text` and carry both plain text and spans
 * - spans are tagged by `kind`; links flatten their handler into `handler` + `known`
 */

export type SpanView =
  | { kind: 'normal'; text: string }
  | { kind: 'verbatim' | 'underline' | 'crossed' | 'bold' | 'italic'; children: SpanView[] }
  | { kind: 'link'; name: string; handler: string; known: boolean; path: string }
  | { kind: 'extra'; delimiter: string; children: SpanView[] };

export type TodoStateView = {
  kind: TodoState['kind'];
  value: string;
  raw?: string;
};

export type EntryView =
  | {
      type: 'todo';
      state: TodoStateView;
      stateText: string;
      description: string;
      descriptionSpans: SpanView[];
    }
  | { type: 'bullet'; text: string; spans: SpanView[] }
  | { type: 'text'; text: string; spans: SpanView[] };

export type HeadingView = {
  name: string;
  entries: EntryView[];
};

export type FileView = {
  headings: HeadingView[];
};

export function toSpanView(span: Span): SpanView {
  switch (span.kind) {
    case 'normal':
      return { kind: 'normal', text: span.text };
    case 'link':
      return {
        kind: 'link',
        name: span.name,
        handler: span.handler.name,
        known: span.handler.kind === 'known',
        path: span.path,
      };
    case 'extra':
      return { kind: 'extra', delimiter: span.delimiter, children: span.children.map(toSpanView) };
    default:
      return { kind: span.kind, children: span.children.map(toSpanView) };
  }
}

function toStateView(state: TodoState): TodoStateView {
  if (state.kind === 'defined') return { kind: 'defined', value: state.value, raw: state.raw };
  if (state.kind === 'other') return { kind: 'other', value: state.value };
  return { kind: 'unset', value: '' };
}

function toEntryView(entry: UnderHeading, config: FormatConfig): EntryView {
  switch (entry.type) {
    case 'todo':
      return {
        type: 'todo',
        state: toStateView(entry.state),
        stateText: displayStateText(entry.state, config),
        description: spansToPlainText(entry.description),
        descriptionSpans: entry.description.map(toSpanView),
      };
    case 'bullet':
      return { type: 'bullet', text: spansToPlainText(entry.text), spans: entry.text.map(toSpanView) };
    case 'text':
      return { type: 'text', text: spansToPlainText(entry.text), spans: entry.text.map(toSpanView) };
  }
}

/**
 * Convert a parsed file into the structured export used by `raw` and `todo.raw`.
 */
export function buildFileView(file: TodoFile, config: FormatConfig): FileView {
  return {
    headings: file.headings.map((heading) => ({
      name: heading.name,
      entries: heading.body.map((entry) => toEntryView(entry, config)),
    })),
  };
}

