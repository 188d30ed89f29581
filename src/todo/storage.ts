import { randomUUID } from 'node:crypto';
import { link, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { addDays, format } from 'date-fns';
import { DAY_FILE_PATTERN, TODO_FILE_EXTENSION } from './constants.js';

/**
 * Filesystem helpers for day-file storage.
 *
 * Responsibilities:
 * - Map a target (relative day or named file) to a path under the todo directory.
 * - Ensure all reads/writes stay within that directory.
 * - Provide atomic writes.
 */
export type Day = 'yesterday' | 'today' | 'tomorrow';

export type TodoTarget = { kind: 'day'; day: Day } | { kind: 'file'; name: string };

const DAY_ALIASES: Readonly<Record<string, Day>> = {
  y: 'yesterday',
  yesterday: 'yesterday',
  t: 'today',
  today: 'today',
  tmr: 'tomorrow',
  tomorrow: 'tomorrow',
};

const DAY_OFFSETS: Readonly<Record<Day, number>> = {
  yesterday: -1,
  today: 0,
  tomorrow: 1,
};

/**
 * Parse `y | t | tmr` (or the full names) into a `Day`.
 */
export function parseDay(value: string): Day | undefined {
  return Object.hasOwn(DAY_ALIASES, value) ? DAY_ALIASES[value] : undefined;
}

export function describeTarget(target: TodoTarget): string {
  return target.kind === 'day' ? target.day : target.name;
}

/**
 * File name for a day relative to `now`, e.g. `18102026.todo`.
 */
export function dayFileName(day: Day, now: Date): string {
  return `${format(addDays(now, DAY_OFFSETS[day]), DAY_FILE_PATTERN)}${TODO_FILE_EXTENSION}`;
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * We check via `relative()` rather than string prefix matching to handle path
 * normalization correctly across platforms.
 *
 * Note: this is a lexical/path-traversal guard only; symlinks are not resolved.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes todo directory: ${absolutePath}`);
  }

  const parts = rel.split(sep);
  if (parts.includes('..')) {
    throw new Error(`Resolved path escapes todo directory: ${absolutePath}`);
  }
}

/**
 * Resolve the `.todo` file for a target.
 *
 * Named files get the extension appended; the result must stay inside `directory`.
 */
export function resolveTodoPath(directory: string, target: TodoTarget, now: Date): string {
  const rootDir = resolve(directory);
  let fileName: string;
  if (target.kind === 'day') {
    fileName = dayFileName(target.day, now);
  } else {
    if (!target.name.trim()) throw new Error('File name must be non-empty');
    fileName = `${target.name}${TODO_FILE_EXTENSION}`;
  }

  const absolutePath = resolve(rootDir, fileName);
  assertPathWithinRoot(rootDir, absolutePath);
  return absolutePath;
}

export async function readTodoFile(absolutePath: string): Promise<string> {
  return readFile(absolutePath, 'utf8');
}

/**
 * Write a file via a temporary path and atomic rename.
 *
 * This pattern avoids torn writes and reduces the risk of leaving a partially
 * written todo file on disk.
 */
export async function writeFileAtomic(absolutePath: string, text: string): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
}

/**
 * Write a file via a temporary path, but fail with `EEXIST` if the destination
 * already exists.
 *
 * Implementation:
 * - Write a temp file in the same directory as the destination.
 * - Atomically `link()` it into place (fails with EEXIST if dest exists).
 * - Remove the temp path; the destination link remains.
 */
export async function writeFileAtomicExclusive(absolutePath: string, text: string): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });

  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  try {
    await link(tmpPath, absolutePath);
  } finally {
    await rm(tmpPath, { force: true });
  }
}
