/**
 * Tests for the printer (canonical and display styles)
 */
import { describe, it, expect } from 'vitest';
import type { FormatConfig, Span, TodoFile } from '../src/todo/model.js';
import { EMPTY_FORMAT_CONFIG } from '../src/todo/model.js';
import { parseTodoText } from '../src/todo/parse.js';
import { printBulletLine, printTodo, printTodoLine, wrapText } from '../src/todo/print.js';

const aliases: FormatConfig = { todoState: { x: 'DONE' }, handlers: ['open'] };

function parseOk(text: string, format: FormatConfig = aliases): TodoFile {
  const result = parseTodoText(text, format);
  if (!result.ok) throw result.error;
  return result.file;
}

const text = (value: string): Span[] => [{ kind: 'normal', text: value }];

const SOURCE =
  '# Work\n' +
  '    [x] buy *milk*\n' +
  '    - see |Docs[open:/tmp/d]|\n' +
  '    some notes\n' +
  '\n' +
  '# Home\n' +
  '    [ ] rest\n';

describe('printTodo', () => {
  it('prints canonical text that matches a canonical source', () => {
    expect(printTodo(parseOk(SOURCE), aliases)).toBe(SOURCE);
  });

  it('reaches a fixpoint after one pass', () => {
    const messy = '\n# A\n[x]   a *b* `c\n-  item\nsome   long   words   here\n\n\n# B\n[]\n';
    const once = printTodo(parseOk(messy), aliases);
    expect(parseOk(once)).toEqual(parseOk(messy));
    expect(printTodo(parseOk(once), aliases)).toBe(once);

    expect(once).toBe(
      '# A\n    [x] a *b* `c\n    - item\n    some   long   words   here\n\n# B\n    [ ]\n'
    );
  });

  it('keeps canonical paragraphs on one line whatever the width', () => {
    const source = '# A\naaaa bbbb #12 cc\n';
    const printed = printTodo(parseOk(source), aliases, { width: 13 });

    expect(printed).toBe('# A\n    aaaa bbbb #12 cc\n');
    expect(parseOk(printed)).toEqual(parseOk(source));
  });

  it('never turns paragraph words into bullets or todos', () => {
    const file = parseOk('# A\nfoo bar - baz [x] qux\n');
    const printed = printTodo(file, aliases, { width: 12 });

    expect(parseOk(printed).headings[0]?.body.map((entry) => entry.type)).toEqual(['text']);
    expect(printTodo(file, aliases, { width: 12, style: 'display' })).toBe(
      'A\n    foo bar\n    - baz\n    [x] qux\n'
    );
  });

  it('prints the display form with aliases applied and link targets hidden', () => {
    expect(printTodo(parseOk(SOURCE), aliases, { style: 'display' })).toBe(
      'Work\n    [DONE] buy *milk*\n    - see |Docs|\n    some notes\n\nHome\n    [ ] rest\n'
    );
  });

  it('wraps display paragraphs at width minus the indent', () => {
    const file: TodoFile = {
      headings: [{ name: 'A', body: [{ type: 'text', text: text('one two three four five') }] }],
    };
    expect(printTodo(file, EMPTY_FORMAT_CONFIG, { width: 14, style: 'display' })).toBe(
      'A\n    one two\n    three four\n    five\n'
    );
  });

  it('prints unterminated spans back literally', () => {
    expect(printTodo(parseOk('# A\n*a _b*\n`code\n'), aliases)).toBe('# A\n    *a _b*\n    `code\n');
  });

  it('uses the configured bullet point in display style only', () => {
    const file: TodoFile = {
      headings: [{ name: 'A', body: [{ type: 'bullet', text: text('a') }] }],
    };
    const starred: FormatConfig = { ...EMPTY_FORMAT_CONFIG, bulletPoint: '*' };

    expect(printTodo(file, EMPTY_FORMAT_CONFIG, { style: 'display' })).toBe('A\n    - a\n');
    expect(printTodo(file, starred, { style: 'display' })).toBe('A\n    * a\n');
    expect(printTodo(file, starred)).toBe('# A\n    - a\n');
  });
});

describe('printTodoLine', () => {
  it('applies the default state and bracket policy when displaying', () => {
    const withDefault: FormatConfig = {
      ...EMPTY_FORMAT_CONFIG,
      todoStateOps: { default: 'TODO', brackets: true },
    };
    const bare: FormatConfig = {
      ...EMPTY_FORMAT_CONFIG,
      todoStateOps: { default: '-', brackets: false },
    };

    expect(printTodoLine({ kind: 'unset' }, text('x'), EMPTY_FORMAT_CONFIG, 'display')).toBe('[ ] x');
    expect(printTodoLine({ kind: 'unset' }, text('x'), withDefault, 'display')).toBe('[TODO] x');
    expect(printTodoLine({ kind: 'unset' }, text('x'), bare, 'display')).toBe('- x');
    expect(printTodoLine({ kind: 'other', value: 'y' }, text('x'), bare, 'display')).toBe('y x');
    expect(printTodoLine({ kind: 'unset' }, text('x'), withDefault)).toBe('[ ] x');
  });

  it('prints the raw key in canonical style', () => {
    const state = { kind: 'defined', raw: 'x', value: 'DONE' } as const;
    expect(printTodoLine(state, text('milk'), aliases)).toBe('[x] milk');
    expect(printTodoLine(state, [], aliases)).toBe('[x]');
  });
});

describe('printBulletLine', () => {
  it('prints the bullet and its text', () => {
    expect(printBulletLine(text('a'), EMPTY_FORMAT_CONFIG)).toBe('- a');
    expect(printBulletLine([], EMPTY_FORMAT_CONFIG)).toBe('-');
  });
});

describe('wrapText', () => {
  it('collapses whitespace runs', () => {
    expect(wrapText('a  b   c', 80)).toEqual(['a b c']);
  });

  it('puts an over-long word on its own line', () => {
    expect(wrapText('abcdefghij xy', 5)).toEqual(['abcdefghij', 'xy']);
  });

  it('returns no lines for blank text', () => {
    expect(wrapText('   ', 10)).toEqual([]);
  });
});
