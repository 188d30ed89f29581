import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import * as z from 'zod';
import {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  DEFAULT_TODO_DIRECTORY,
} from './todo/constants.js';
import type { FormatConfig } from './todo/model.js';

/**
 * User configuration for daytodo.
 *
 * The file is JSON. `directory` is where day files live; `todoState` maps raw bracket
 * text to display text; `handlers` maps link handler names to commands, where each
 * `{path}` in `args` is replaced by the link's path.
 */
const HandlerCommandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default(['{path}']),
});

export const DayTodoConfigSchema = z.object({
  directory: z.string().min(1),
  template: z.string().optional(),
  templateTomorrow: z.string().optional(),
  editor: z.string().optional(),
  bulletPoint: z.string().optional(),
  todoStateOps: z
    .object({
      default: z.string(),
      brackets: z.boolean().default(true),
    })
    .optional(),
  todoState: z.record(z.string(), z.string()).default({}),
  handlers: z.record(z.string(), HandlerCommandSchema).default({}),
});

export type DayTodoConfig = z.infer<typeof DayTodoConfigSchema>;
export type HandlerCommand = z.infer<typeof HandlerCommandSchema>;

/**
 * Options shared by the CLI and the MCP server for locating configuration.
 */
export interface ConfigLocation {
  /** Explicit config file; defaults to the XDG location. */
  configPath?: string;
  /** Overrides `directory` from the config file. */
  directory?: string;
}

export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/**
 * `$XDG_CONFIG_HOME/daytodo/config.json`, falling back to `~/.config`.
 */
export function defaultConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  const base = env.XDG_CONFIG_HOME || join(home, '.config');
  return join(base, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Validate a decoded config value and expand `~` in its paths.
 *
 * Throws with every failing field path when the value does not match the schema.
 */
export function parseConfig(value: unknown, source: string, home: string = homedir()): DayTodoConfig {
  const parsed = DayTodoConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config ${source}: ${issues}`);
  }

  const config = parsed.data;
  return {
    ...config,
    directory: expandHome(config.directory, home),
    template: config.template === undefined ? undefined : expandHome(config.template, home),
    templateTomorrow:
      config.templateTomorrow === undefined ? undefined : expandHome(config.templateTomorrow, home),
  };
}

function isEnoent(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and validate the config file.
 *
 * When the default location has no file yet, a minimal one is written first so users
 * have something to edit. An explicit `configPath` must exist.
 */
export async function loadConfig(location: ConfigLocation = {}): Promise<DayTodoConfig> {
  const path = location.configPath ?? defaultConfigPath();

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (location.configPath !== undefined || !isEnoent(error)) throw error;
    text = `${JSON.stringify({ directory: DEFAULT_TODO_DIRECTORY }, null, 2)}\n`;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, text, 'utf8');
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config ${path}: ${reason}`);
  }

  const config = parseConfig(value, path);
  return location.directory ? { ...config, directory: location.directory } : config;
}

/**
 * The read-only subset the format core needs.
 */
export function toFormatConfig(config: DayTodoConfig): FormatConfig {
  return {
    todoState: config.todoState,
    todoStateOps: config.todoStateOps,
    bulletPoint: config.bulletPoint,
    handlers: Object.keys(config.handlers),
  };
}

/**
 * Parse MCP server CLI args into a `ConfigLocation`.
 *
 * Supported flags:
 * - `--config <file>`: config file (defaults to the XDG location).
 * - `--directory <dir>`: todo directory, overriding the config file.
 */
export function loadConfigFromArgs(argv: string[], cwd: string): ConfigLocation {
  const args = [...argv];
  const location: ConfigLocation = {};

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--config') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --config');
      location.configPath = resolve(cwd, value);
      continue;
    }

    if (flag === '--directory') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --directory');
      location.directory = resolve(cwd, expandHome(value));
      continue;
    }

    throw new Error(`Unknown argument: ${flag}`);
  }

  return location;
}
