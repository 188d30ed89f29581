#!/usr/bin/env node

/**
 * `daytodo` - local CLI for dated `.todo` files.
 *
 * This CLI is a first-class interface alongside the stdio server. Both share
 * the same core todo API so behavior stays in sync.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { DayTodoConfig } from './config.js';
import { loadConfig } from './config.js';
import {
  createTodo,
  formatTodo,
  listTodoLinks,
  locateTodo,
  openTodoLink,
  rawTodo,
  showTodo,
  tokensTodo,
  widgetTodo,
} from './todo/api.js';
import { HandlerDispatchError, ParseError } from './todo/errors.js';
import { buildHandlerRegistry, openInEditor } from './todo/launch.js';
import type { LinkHandlerRegistry } from './todo/links.js';
import { dispatchLink, formatLinkList } from './todo/links.js';
import type { TodoTarget } from './todo/storage.js';
import { parseDay } from './todo/storage.js';

export interface DayTodoIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Seams for tests and embedders. Anything omitted uses the real process.
 */
export interface DayTodoCliOptions {
  now?: Date;
  /** Terminal width used when `--width` is not given. */
  width?: number;
  openEditor?: (editor: string | undefined, path: string) => Promise<void>;
  handlers?: LinkHandlerRegistry;
}

interface CliContext {
  config: DayTodoConfig;
  target: TodoTarget;
  io: DayTodoIo;
  options: DayTodoCliOptions;
}

/**
 * Render CLI help text.
 *
 * Keep this stable and human-readable: tests and users often depend on it.
 */
function helpText(): string {
  return [
    'daytodo - dated todo files',
    '',
    'Usage:',
    '  daytodo [--config <path>] [y|t|tmr | --file <name>] <cmd>',
    '',
    'File:',
    '  daytodo new [--editor]',
    '  daytodo edit',
    '  daytodo show [--width <n>]',
    '  daytodo fmt',
    '',
    'Export:',
    '  daytodo raw',
    '  daytodo widget',
    '  daytodo tokens',
    '',
    'Links:',
    '  daytodo links list',
    '  daytodo links open <index>',
    '  daytodo links open-raw <handler> <path>',
    '',
    'Other:',
    '  daytodo config',
    '',
    'Notes:',
    '  The day defaults to t (today). y = yesterday, tmr = tomorrow.',
    '  Output: JSON for raw/widget/tokens/config/new/fmt, text otherwise; errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: DayTodoIo): void {
  io.stdout.write(helpText());
}

/**
 * Write a JSON value to stdout (pretty-printed).
 */
function writeJson(io: DayTodoIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 *
 * Returns true if the flag was present and removed.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

/**
 * Ensure there are no remaining `--unknown` flags or stray arguments in argv.
 */
function assertNoLeftovers(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
  if (argv.length > 0) throw new Error(`Unexpected argument: ${argv[0] ?? ''}`);
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: ${JSON.stringify(value)}`);
  }
  return parsed;
}

function parseIndex(value: string | undefined): number {
  if (value === undefined) throw new Error('Missing <index>');
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid <index>: ${JSON.stringify(value)}`);
  }
  return parsed;
}

function terminalWidth(ctx: CliContext, argv: string[]): number | undefined {
  return parsePositiveInt(takeOption(argv, '--width'), '--width') ?? ctx.options.width;
}

function handlerRegistry(ctx: CliContext): LinkHandlerRegistry {
  return ctx.options.handlers ?? buildHandlerRegistry(ctx.config);
}

/**
 * Execute `daytodo links ...` commands.
 */
async function handleLinksCommand(ctx: CliContext, argv: string[]): Promise<number> {
  const sub = argv.shift();
  const { config, target, io, options } = ctx;

  if (sub === 'list') {
    assertNoLeftovers(argv);
    const links = await listTodoLinks(config, target, { now: options.now });
    if (links.length > 0) io.stdout.write(`${formatLinkList(links)}\n`);
    return 0;
  }

  if (sub === 'open') {
    const index = parseIndex(argv.shift());
    assertNoLeftovers(argv);
    await openTodoLink(config, target, index, handlerRegistry(ctx), { now: options.now });
    return 0;
  }

  if (sub === 'open-raw') {
    const handler = argv.shift();
    const path = argv.shift();
    assertNoLeftovers(argv);
    if (!handler) throw new Error('Missing <handler>');
    if (path === undefined) throw new Error('Missing <path>');
    await dispatchLink({ handler, path }, handlerRegistry(ctx));
    return 0;
  }

  throw new Error(`Unknown links command: ${sub ?? '(missing)'}`);
}

async function handleCommand(ctx: CliContext, cmd: string, argv: string[]): Promise<number> {
  const { config, target, io, options } = ctx;
  const openEditor = options.openEditor ?? openInEditor;

  if (cmd === 'new') {
    const withEditor = takeFlag(argv, '--editor');
    assertNoLeftovers(argv);
    const created = await createTodo(config, target, { now: options.now });
    if (withEditor) await openEditor(config.editor, created.path);
    writeJson(io, created);
    return 0;
  }

  if (cmd === 'edit') {
    assertNoLeftovers(argv);
    const path = await locateTodo(config, target, { now: options.now });
    await openEditor(config.editor, path);
    return 0;
  }

  if (cmd === 'show') {
    const width = terminalWidth(ctx, argv);
    assertNoLeftovers(argv);
    io.stdout.write(await showTodo(config, target, { now: options.now, width }));
    return 0;
  }

  if (cmd === 'fmt') {
    assertNoLeftovers(argv);
    writeJson(io, await formatTodo(config, target, { now: options.now }));
    return 0;
  }

  if (cmd === 'raw') {
    assertNoLeftovers(argv);
    writeJson(io, await rawTodo(config, target, { now: options.now }));
    return 0;
  }

  if (cmd === 'widget') {
    assertNoLeftovers(argv);
    writeJson(io, await widgetTodo(config, target, { now: options.now }));
    return 0;
  }

  if (cmd === 'tokens') {
    assertNoLeftovers(argv);
    writeJson(io, await tokensTodo(config, target, { now: options.now }));
    return 0;
  }

  if (cmd === 'links') {
    return await handleLinksCommand(ctx, argv);
  }

  if (cmd === 'config') {
    assertNoLeftovers(argv);
    writeJson(io, config);
    return 0;
  }

  throw new Error(`Unknown command: ${cmd}`);
}

/**
 * Parse the optional target: `--file <name>` or a leading `y | t | tmr`.
 */
function takeTarget(argv: string[]): TodoTarget {
  const name = takeOption(argv, '--file');
  const first = argv[0];
  const day = first === undefined ? undefined : parseDay(first);
  if (day) argv.shift();

  if (name !== undefined) {
    if (day) throw new Error('Use either a day or --file, not both');
    return { kind: 'file', name };
  }
  return { kind: 'day', day: day ?? 'today' };
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`. This keeps the CLI
 * testable without relying on spawning child processes.
 */
export async function runDayTodoCli(
  args: string[],
  io: DayTodoIo = { stdout: process.stdout, stderr: process.stderr },
  options: DayTodoCliOptions = {}
): Promise<number> {
  const argv = [...args];

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io);
      return 0;
    }

    const configPath = takeOption(argv, '--config');
    const target = takeTarget(argv);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io);
      return 0;
    }

    const config = await loadConfig({ configPath });
    return await handleCommand({ config, target, io, options }, cmd, argv);
  } catch (error) {
    if (error instanceof ParseError) {
      io.stderr.write(`${error.format()}\n`);
      return 1;
    }
    if (error instanceof HandlerDispatchError) {
      io.stderr.write(`${error.message}\n`);
      return 1;
    }
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    io.stderr.write('\n');
    writeHelp(io);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runDayTodoCli(process.argv.slice(2), undefined, {
    width: process.stdout.columns,
  });
  if (exitCode !== 0) process.exitCode = exitCode;
}
