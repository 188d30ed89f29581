import type { FormatConfig, HandlerRef, TodoState } from './model.js';

/**
 * Resolve raw bracket text against the configured alias table.
 *
 * - `''` => unset (the printer applies the default state)
 * - alias hit => defined (keeps the raw key for canonical output)
 * - anything else => other, verbatim
 */
export function resolveTodoState(raw: string, config: FormatConfig): TodoState {
  if (raw === '') return { kind: 'unset' };
  if (Object.hasOwn(config.todoState, raw)) {
    const value = config.todoState[raw];
    if (value !== undefined) return { kind: 'defined', raw, value };
  }
  return { kind: 'other', value: raw };
}

/**
 * Text a state is written as on disk.
 */
export function canonicalStateText(state: TodoState): string {
  if (state.kind === 'defined') return state.raw;
  if (state.kind === 'other') return state.value;
  return ' ';
}

/**
 * Text a state is shown as: the alias value, or the configured default when unset.
 */
export function displayStateText(state: TodoState, config: FormatConfig): string {
  if (state.kind === 'unset') return config.todoStateOps?.default ?? ' ';
  return state.value;
}

export function resolveHandler(name: string, config: FormatConfig): HandlerRef {
  return config.handlers.includes(name) ? { kind: 'known', name } : { kind: 'unknown', name };
}
