import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { ConfigLocation, DayTodoConfig } from './config.js';
import { loadConfig } from './config.js';
import {
  createTodo,
  formatTodo,
  listTodoLinks,
  rawTodo,
  showTodo,
  tokensTodo,
  validateTodo,
} from './todo/api.js';
import { ParseError } from './todo/errors.js';
import type { TodoTarget } from './todo/storage.js';

const TARGET_INPUT = {
  day: z.enum(['yesterday', 'today', 'tomorrow']).optional(),
  file: z.string().optional(),
};

/**
 * Map tool arguments to a target. `file` wins over `day`; neither means today.
 */
export function toTarget(args: { day?: 'yesterday' | 'today' | 'tomorrow'; file?: string }): TodoTarget {
  if (args.file !== undefined) return { kind: 'file', name: args.file };
  return { kind: 'day', day: args.day ?? 'today' };
}

/**
 * Re-throw parse failures with their rule path so tool errors stay diagnosable.
 */
async function withParseContext<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ParseError) throw new Error(error.format(), { cause: error });
    throw error;
  }
}

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention: `todo.*`, each taking an optional `day` (default today)
 * or a named `file` under the configured directory.
 */
export function createMcpServer(config: DayTodoConfig): McpServer {
  const server = new McpServer({ name: 'daytodo-mcp', version: '0.1.0' });

  server.registerTool(
    'todo.show',
    {
      title: 'Show a todo file',
      description: 'Render a todo file for reading, with state aliases and the bullet point applied.',
      inputSchema: {
        ...TARGET_INPUT,
        width: z.number().int().min(8).max(400).optional(),
      },
      outputSchema: { text: z.string() },
    },
    async ({ day, file, width }) => {
      const text = await withParseContext(() => showTodo(config, toTarget({ day, file }), { width }));
      return {
        content: [{ type: 'text', text }],
        structuredContent: { text },
      };
    }
  );

  server.registerTool(
    'todo.raw',
    {
      title: 'Get a parsed todo file',
      description: 'Parse a todo file and return headings, entries and inline spans as structured data.',
      inputSchema: TARGET_INPUT,
      outputSchema: { view: z.any() },
    },
    async ({ day, file }) => {
      const view = await withParseContext(() => rawTodo(config, toTarget({ day, file })));
      return {
        content: [{ type: 'text', text: JSON.stringify({ view }, null, 2) }],
        structuredContent: { view },
      };
    }
  );

  server.registerTool(
    'todo.tokens',
    {
      title: 'Lex a todo file',
      description: 'Return the line tokens of a todo file (works even when parsing fails).',
      inputSchema: TARGET_INPUT,
      outputSchema: { tokens: z.any() },
    },
    async ({ day, file }) => {
      const tokens = await tokensTodo(config, toTarget({ day, file }));
      return {
        content: [{ type: 'text', text: JSON.stringify({ tokens }, null, 2) }],
        structuredContent: { tokens },
      };
    }
  );

  server.registerTool(
    'todo.links',
    {
      title: 'List links',
      description: 'List the links in a todo file, numbered in document order.',
      inputSchema: TARGET_INPUT,
      outputSchema: {
        links: z.array(
          z.object({
            index: z.number().int().nonnegative(),
            heading: z.string(),
            name: z.string(),
            handler: z.string(),
            known: z.boolean(),
            path: z.string(),
          })
        ),
      },
    },
    async ({ day, file }) => {
      const links = await withParseContext(() => listTodoLinks(config, toTarget({ day, file })));
      return {
        content: [{ type: 'text', text: JSON.stringify({ links }, null, 2) }],
        structuredContent: { links },
      };
    }
  );

  server.registerTool(
    'todo.create',
    {
      title: 'Create a todo file',
      description: 'Create a todo file from the configured template. Fails if the file exists.',
      inputSchema: TARGET_INPUT,
      outputSchema: { path: z.string() },
    },
    async ({ day, file }) => {
      const created = await createTodo(config, toTarget({ day, file }));
      return {
        content: [{ type: 'text', text: JSON.stringify(created, null, 2) }],
        structuredContent: created,
      };
    }
  );

  server.registerTool(
    'todo.format',
    {
      title: 'Format a todo file',
      description: 'Rewrite a todo file in canonical form (entries indented, spacing normalized).',
      inputSchema: TARGET_INPUT,
      outputSchema: { path: z.string(), changed: z.boolean() },
    },
    async ({ day, file }) => {
      const result = await withParseContext(() => formatTodo(config, toTarget({ day, file })));
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  server.registerTool(
    'todo.validate',
    {
      title: 'Validate a todo file',
      description: 'Parse a todo file and return diagnostics instead of failing.',
      inputSchema: TARGET_INPUT,
      outputSchema: {
        errors: z.array(
          z.object({
            code: z.string(),
            message: z.string(),
            line: z.number().int().positive().optional(),
          })
        ),
        warnings: z.array(
          z.object({
            code: z.string(),
            message: z.string(),
            line: z.number().int().positive().optional(),
          })
        ),
      },
    },
    async ({ day, file }) => {
      const { errors, warnings } = await validateTodo(config, toTarget({ day, file }));
      return {
        content: [{ type: 'text', text: JSON.stringify({ errors, warnings }, null, 2) }],
        structuredContent: { errors, warnings },
      };
    }
  );

  return server;
}

/**
 * Load configuration, connect the MCP server to stdio and start serving requests.
 */
export async function runStdioServer(location: ConfigLocation): Promise<void> {
  const config = await loadConfig(location);
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
