import type { StyleDelimiter, StyleKind } from './model.js';

/**
 * `.todo` format constants.
 *
 * These values define the on-disk markup:
 * - the paired inline delimiters and the span kind each one opens
 * - the link marker and its sub-grammar separators
 * - day-file naming under the configured directory
 */
export const STYLE_DELIMITERS: Readonly<Record<StyleDelimiter, StyleKind>> = {
  '`': 'verbatim',
  _: 'underline',
  '-': 'crossed',
  '*': 'bold',
  '/': 'italic',
};

export const KIND_DELIMITERS: Readonly<Record<StyleKind, StyleDelimiter>> = {
  verbatim: '`',
  underline: '_',
  crossed: '-',
  bold: '*',
  italic: '/',
};

/**
 * Link syntax: `|name[handler:path]|`.
 */
export const LINK_MARKER = '|';
export const LINK_HANDLER_OPEN = '[';
export const LINK_PATH_SEPARATOR = ':';
export const LINK_HANDLER_CLOSE = ']';

/** Indent used for every entry under a heading. */
export const BODY_INDENT = '    ';

export const DEFAULT_BULLET_POINT = '-';
export const DEFAULT_WIDTH = 80;

export const TODO_FILE_EXTENSION = '.todo';

/**
 * date-fns pattern for day files, e.g. `18102026.todo`.
 */
export const DAY_FILE_PATTERN = 'ddMMyyyy';

/** Directory name under the XDG config home. */
export const CONFIG_DIR_NAME = 'daytodo';
export const CONFIG_FILE_NAME = 'config.json';
export const DEFAULT_TODO_DIRECTORY = '~/todo';
