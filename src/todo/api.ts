import type { DayTodoConfig } from '../config.js';
import { toFormatConfig } from '../config.js';
import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';
import { lexTodo } from './lex.js';
import type { LinkHandlerRegistry, LinkRef } from './links.js';
import { collectLinks, dispatchLink } from './links.js';
import type { LineToken, TodoFile } from './model.js';
import { parseTodoText } from './parse.js';
import { printTodo } from './print.js';
import type { TodoTarget } from './storage.js';
import {
  describeTarget,
  readTodoFile,
  resolveTodoPath,
  writeFileAtomic,
  writeFileAtomicExclusive,
} from './storage.js';
import type { FileView } from './view.js';
import { buildFileView } from './view.js';
import type { WidgetTodo } from './widget.js';
import { buildWidgetTodos } from './widget.js';

/**
 * Public API for todo-file operations.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - the format core (`lex.ts`, `parse.ts`, `print.ts`)
 * - exports (`view.ts`, `widget.ts`, `links.ts`)
 *
 * Every operation reads the whole file before the core runs. Parse failures are
 * thrown as `ParseError` so callers can print the rule path.
 */
export interface TargetOptions {
  /** Reference time for relative days (defaults to the current time). */
  now?: Date;
}

export interface ReadTodoResult {
  path: string;
  text: string;
  file: TodoFile;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

async function readExisting(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions
): Promise<{ path: string; text: string }> {
  const path = resolveTodoPath(config.directory, target, options.now ?? new Date());
  try {
    return { path, text: await readTodoFile(path) };
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      throw new Error(`Todo file does not exist: ${path}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Resolve the path of an existing todo file without parsing it.
 */
export async function locateTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions = {}
): Promise<string> {
  const { path } = await readExisting(config, target, options);
  return path;
}

/**
 * Read and parse a todo file.
 */
export async function readTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions = {}
): Promise<ReadTodoResult> {
  const { path, text } = await readExisting(config, target, options);
  const result = parseTodoText(text, toFormatConfig(config));
  if (!result.ok) throw result.error;
  return { path, text, file: result.file };
}

function templateFor(config: DayTodoConfig, target: TodoTarget): string | undefined {
  if (target.kind === 'file') return undefined;
  if (target.day === 'tomorrow') return config.templateTomorrow ?? config.template;
  return config.template;
}

/**
 * Create a new todo file from the configured template.
 *
 * Never overwrites: an existing file fails with `Todo for <target> already exists`.
 */
export async function createTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions = {}
): Promise<{ path: string }> {
  const path = resolveTodoPath(config.directory, target, options.now ?? new Date());
  const template = templateFor(config, target);
  const text = template ? await readTodoFile(template) : '';

  try {
    await writeFileAtomicExclusive(path, text);
  } catch (error) {
    if (isErrnoCode(error, 'EEXIST')) {
      throw new Error(`Todo for ${describeTarget(target)} already exists`, { cause: error });
    }
    throw error;
  }
  return { path };
}

export interface ShowTodoOptions extends TargetOptions {
  width?: number;
}

/**
 * Render a todo file for reading (aliases, default state and bullet point applied).
 */
export async function showTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: ShowTodoOptions = {}
): Promise<string> {
  const { file } = await readTodo(config, target, options);
  return printTodo(file, toFormatConfig(config), { width: options.width, style: 'display' });
}

export async function rawTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions = {}
): Promise<FileView> {
  const { file } = await readTodo(config, target, options);
  return buildFileView(file, toFormatConfig(config));
}

export async function widgetTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions & { command?: string } = {}
): Promise<WidgetTodo[]> {
  const { file } = await readTodo(config, target, options);
  return buildWidgetTodos(file, toFormatConfig(config), { command: options.command });
}

/**
 * Lex a todo file without parsing it (useful when the parser rejects the file).
 */
export async function tokensTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions = {}
): Promise<LineToken[]> {
  const { text } = await readExisting(config, target, options);
  return lexTodo(text);
}

export async function listTodoLinks(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions = {}
): Promise<LinkRef[]> {
  const { file } = await readTodo(config, target, options);
  return collectLinks(file);
}

/**
 * Dispatch the link at `index` (as numbered by `listTodoLinks`).
 */
export async function openTodoLink(
  config: DayTodoConfig,
  target: TodoTarget,
  index: number,
  registry: LinkHandlerRegistry,
  options: TargetOptions = {}
): Promise<LinkRef> {
  const links = await listTodoLinks(config, target, options);
  const link = links[index];
  if (!link) {
    throw new Error(`Link index out of range: ${index} (file has ${links.length} links)`);
  }
  await dispatchLink(link, registry);
  return link;
}

/**
 * Rewrite a todo file in canonical form. The file is left untouched when nothing
 * would change.
 */
export async function formatTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions = {}
): Promise<{ path: string; changed: boolean }> {
  const { path, text, file } = await readTodo(config, target, options);
  const formatted = printTodo(file, toFormatConfig(config), { style: 'canonical' });
  if (formatted === text) return { path, changed: false };
  await writeFileAtomic(path, formatted);
  return { path, changed: true };
}

export interface ValidateTodoResult {
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/**
 * Parse a todo file and report diagnostics instead of throwing.
 */
export async function validateTodo(
  config: DayTodoConfig,
  target: TodoTarget,
  options: TargetOptions = {}
): Promise<ValidateTodoResult> {
  const { text } = await readExisting(config, target, options);
  const result = parseTodoText(text, toFormatConfig(config));
  if (!result.ok) return { errors: [result.error.toDiagnostic()], warnings: [] };

  const hasTodos = result.file.headings.some((heading) =>
    heading.body.some((entry) => entry.type === 'todo')
  );
  return {
    errors: [],
    warnings: hasTodos ? [] : [warningDiagnostic('NO_TODOS', 'No todos found in file.')],
  };
}
