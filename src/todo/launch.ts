import { spawn } from 'node:child_process';
import type { DayTodoConfig } from '../config.js';
import type { LinkHandler, LinkHandlerRegistry } from './links.js';

/**
 * Process launching for the editor and link handlers.
 *
 * Both run with inherited stdio and resolve once the child exits; a non-zero exit
 * code or spawn failure rejects.
 */
function runCommand(command: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });
    child.on('error', reject);
    child.on('exit', (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(
        new Error(
          `${command} exited with ${signal ? `signal ${signal}` : `code ${String(code)}`}`
        )
      );
    });
  });
}

/**
 * Pick the editor: configured, then `$VISUAL`, then `$EDITOR`, then `vi`.
 */
export function resolveEditor(
  configured: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return configured || env.VISUAL || env.EDITOR || 'vi';
}

export async function openInEditor(editor: string | undefined, path: string): Promise<void> {
  await runCommand(resolveEditor(editor), [path]);
}

/**
 * Replace every `{path}` placeholder in handler arguments.
 */
export function expandHandlerArgs(args: string[], path: string): string[] {
  return args.map((arg) => arg.split('{path}').join(path));
}

/**
 * Build the link handler registry from configured commands.
 */
export function buildHandlerRegistry(
  config: DayTodoConfig,
  run: (command: string, args: string[]) => Promise<void> = runCommand
): LinkHandlerRegistry {
  const registry = new Map<string, LinkHandler>();
  for (const [name, handler] of Object.entries(config.handlers)) {
    registry.set(name, (path) => run(handler.command, expandHandlerArgs(handler.args, path)));
  }
  return registry;
}
