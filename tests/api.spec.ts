/**
 * Tests for the file-level todo API against a temporary directory
 */
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { DayTodoConfig } from '../src/config.js';
import { parseConfig } from '../src/config.js';
import {
  createTodo,
  formatTodo,
  listTodoLinks,
  openTodoLink,
  readTodo,
  showTodo,
  tokensTodo,
  validateTodo,
  widgetTodo,
} from '../src/todo/api.js';
import { ParseError } from '../src/todo/errors.js';
import type { TodoTarget } from '../src/todo/storage.js';

const now = new Date(2026, 9, 18, 9, 30);
const today: TodoTarget = { kind: 'day', day: 'today' };
const work: TodoTarget = { kind: 'file', name: 'work' };

describe('todo api', () => {
  let dir: string;
  let config: DayTodoConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'daytodo-api-'));
    config = parseConfig(
      {
        directory: dir,
        todoState: { x: 'DONE' },
        todoStateOps: { default: 'TODO' },
        handlers: { open: { command: 'xdg-open' } },
      },
      'test'
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates a day file from the template and never overwrites it', async () => {
    const template = join(dir, 'template.todo');
    await writeFile(template, '# Today\n    [ ] plan\n', 'utf8');
    const withTemplate = { ...config, template };

    const created = await createTodo(withTemplate, today, { now });
    expect(created).toEqual({ path: join(dir, '18102026.todo') });
    expect(await readFile(created.path, 'utf8')).toBe('# Today\n    [ ] plan\n');

    await expect(createTodo(withTemplate, today, { now })).rejects.toThrow(
      'Todo for today already exists'
    );
  });

  it('uses the tomorrow template for tomorrow', async () => {
    const template = join(dir, 'template.todo');
    const templateTomorrow = join(dir, 'tomorrow.todo');
    await writeFile(template, '# Today\n', 'utf8');
    await writeFile(templateTomorrow, '# Tomorrow\n', 'utf8');

    const { path } = await createTodo(
      { ...config, template, templateTomorrow },
      { kind: 'day', day: 'tomorrow' },
      { now }
    );
    expect(path).toBe(join(dir, '19102026.todo'));
    expect(await readFile(path, 'utf8')).toBe('# Tomorrow\n');
  });

  it('creates named files empty', async () => {
    const { path } = await createTodo({ ...config, template: join(dir, 'unused.todo') }, work);
    expect(await readFile(path, 'utf8')).toBe('');
  });

  it('reports a missing file', async () => {
    await expect(readTodo(config, today, { now })).rejects.toThrow(
      `Todo file does not exist: ${join(dir, '18102026.todo')}`
    );
  });

  it('shows a file in display form', async () => {
    await writeFile(join(dir, 'work.todo'), '# Work\n[x] ship\n[] test\n- note\n', 'utf8');
    expect(await showTodo(config, work)).toBe('Work\n    [DONE] ship\n    [TODO] test\n    - note\n');
  });

  it('throws the parse error for malformed files', async () => {
    await writeFile(join(dir, 'work.todo'), 'loose text\n', 'utf8');
    await expect(showTodo(config, work)).rejects.toBeInstanceOf(ParseError);
  });

  it('lexes files the parser rejects', async () => {
    await writeFile(join(dir, 'work.todo'), 'loose\n', 'utf8');
    expect(await tokensTodo(config, work)).toEqual([
      { type: 'text', spans: [{ kind: 'normal', text: 'loose' }], line: 1 },
      { type: 'newline', line: 1 },
    ]);
  });

  it('formats a file in place only when it changes', async () => {
    const path = join(dir, 'work.todo');
    await writeFile(path, '# Work\n[x]  ship\n-   note\n', 'utf8');

    expect(await formatTodo(config, work)).toEqual({ path, changed: true });
    expect(await readFile(path, 'utf8')).toBe('# Work\n    [x] ship\n    - note\n');
    expect(await formatTodo(config, work)).toEqual({ path, changed: false });
  });

  it('formats paragraphs without reflowing them into other entries', async () => {
    const path = join(dir, 'work.todo');
    await writeFile(path, '# A\naaaa bbbb #12 cc\n', 'utf8');

    expect(await formatTodo(config, work)).toEqual({ path, changed: true });
    expect(await readFile(path, 'utf8')).toBe('# A\n    aaaa bbbb #12 cc\n');
    const { file } = await readTodo(config, work);
    expect(file.headings[0]?.body.map((entry) => entry.type)).toEqual(['text']);
  });

  it('validates files into diagnostics', async () => {
    await writeFile(join(dir, 'work.todo'), '# A\n- a\n# B\n', 'utf8');
    const broken = await validateTodo(config, work);
    expect(broken.errors.map((error) => error.code)).toEqual(['NESTED_HEADING']);
    expect(broken.errors[0]?.line).toBe(3);

    await writeFile(join(dir, 'work.todo'), '# A\n- a\n', 'utf8');
    expect(await validateTodo(config, work)).toEqual({
      errors: [],
      warnings: [{ severity: 'warning', code: 'NO_TODOS', message: 'No todos found in file.' }],
    });

    await writeFile(join(dir, 'work.todo'), '# A\n[x] a\n', 'utf8');
    expect(await validateTodo(config, work)).toEqual({ errors: [], warnings: [] });
  });

  it('exports widget entries', async () => {
    await writeFile(join(dir, 'work.todo'), '# A\n[] plan\n', 'utf8');
    expect(await widgetTodo(config, work)).toEqual([
      { state: 'TODO', description: ['(label :halign "start" :text "plan")'] },
    ]);
  });

  it('lists and opens links by index', async () => {
    await writeFile(join(dir, 'work.todo'), '# A\n- |Doc[open:/tmp/doc]| |Web[web:x]|\n', 'utf8');
    const open = vi.fn(async (_path: string) => {});

    expect((await listTodoLinks(config, work)).map((link) => link.name)).toEqual(['Doc', 'Web']);

    const opened = await openTodoLink(config, work, 0, new Map([['open', open]]));
    expect(opened.path).toBe('/tmp/doc');
    expect(open).toHaveBeenCalledWith('/tmp/doc');

    await expect(openTodoLink(config, work, 2, new Map())).rejects.toThrow(
      'Link index out of range: 2 (file has 2 links)'
    );
  });
});
