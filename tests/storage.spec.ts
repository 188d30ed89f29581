/**
 * Tests for day-file naming and path resolution
 */
import { describe, it, expect } from 'vitest';
import { dayFileName, describeTarget, parseDay, resolveTodoPath } from '../src/todo/storage.js';

const now = new Date(2026, 9, 18, 9, 30);

describe('parseDay', () => {
  it('accepts short and long day names', () => {
    expect(parseDay('y')).toBe('yesterday');
    expect(parseDay('t')).toBe('today');
    expect(parseDay('tmr')).toBe('tomorrow');
    expect(parseDay('tomorrow')).toBe('tomorrow');
  });

  it('rejects anything else', () => {
    expect(parseDay('show')).toBeUndefined();
    expect(parseDay('constructor')).toBeUndefined();
  });
});

describe('dayFileName', () => {
  it('names files day, month, year', () => {
    expect(dayFileName('today', now)).toBe('18102026.todo');
    expect(dayFileName('yesterday', now)).toBe('17102026.todo');
    expect(dayFileName('tomorrow', new Date(2026, 9, 31))).toBe('01112026.todo');
  });
});

describe('resolveTodoPath', () => {
  it('resolves day and named targets inside the directory', () => {
    expect(resolveTodoPath('/todo', { kind: 'day', day: 'today' }, now)).toBe('/todo/18102026.todo');
    expect(resolveTodoPath('/todo', { kind: 'file', name: 'work' }, now)).toBe('/todo/work.todo');
    expect(resolveTodoPath('/todo', { kind: 'file', name: 'a/b' }, now)).toBe('/todo/a/b.todo');
  });

  it('rejects names that escape the directory', () => {
    expect(() => resolveTodoPath('/todo', { kind: 'file', name: '../x' }, now)).toThrow(
      'Resolved path escapes todo directory: /x.todo'
    );
  });

  it('rejects blank names', () => {
    expect(() => resolveTodoPath('/todo', { kind: 'file', name: '  ' }, now)).toThrow(
      'File name must be non-empty'
    );
  });

  it('describes targets', () => {
    expect(describeTarget({ kind: 'day', day: 'tomorrow' })).toBe('tomorrow');
    expect(describeTarget({ kind: 'file', name: 'work' })).toBe('work');
  });
});
