/**
 * Tests for the MCP tools, driven through an in-memory client
 */
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { parseConfig } from '../src/config.js';
import { createMcpServer, toTarget } from '../src/server.js';

function textOf(result: CallToolResult): string {
  return result.content.map((item) => (item.type === 'text' ? item.text : '')).join('');
}

describe('mcp server', () => {
  let dir: string;
  let server: McpServer;
  let client: Client;

  async function call(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'daytodo-mcp-'));
    await writeFile(join(dir, 'work.todo'), '# Work\n[x] ship\n', 'utf8');

    server = createMcpServer(parseConfig({ directory: dir, todoState: { x: 'DONE' } }, 'test'));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: 'daytodo-test', version: '0.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('registers the todo tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'todo.create',
      'todo.format',
      'todo.links',
      'todo.raw',
      'todo.show',
      'todo.tokens',
      'todo.validate',
    ]);
  });

  it('shows a file in display form', async () => {
    const result = await call('todo.show', { file: 'work' });
    expect(result.isError).toBeFalsy();
    expect(result.structuredContent).toEqual({ text: 'Work\n    [DONE] ship\n' });
    expect(textOf(result)).toBe('Work\n    [DONE] ship\n');
  });

  it('returns the parsed view', async () => {
    const result = await call('todo.raw', { file: 'work' });
    expect(result.structuredContent).toEqual({
      view: {
        headings: [
          {
            name: 'Work',
            entries: [
              {
                type: 'todo',
                state: { kind: 'defined', value: 'DONE', raw: 'x' },
                stateText: 'DONE',
                description: 'ship',
                descriptionSpans: [{ kind: 'normal', text: 'ship' }],
              },
            ],
          },
        ],
      },
    });
  });

  it('formats a file in place', async () => {
    const path = join(dir, 'messy.todo');
    await writeFile(path, '# A\n-   x\n', 'utf8');

    const result = await call('todo.format', { file: 'messy' });
    expect(result.structuredContent).toEqual({ path, changed: true });
    expect(await readFile(path, 'utf8')).toBe('# A\n    - x\n');
  });

  it('reports parse errors as tool errors with their rule path', async () => {
    await writeFile(join(dir, 'broken.todo'), '# A\n[x] ok\n# B\n', 'utf8');

    const result = await call('todo.show', { file: 'broken' });
    expect(result.isError).toBe(true);
    expect(textOf(result)).toContain(
      'Heading cannot nest inside another heading (line 3)\n  at Heading (line 1)\n  at File (line 1)'
    );
  });

  it('validates without failing the call', async () => {
    await writeFile(join(dir, 'broken.todo'), '# A\n[x] ok\n# B\n', 'utf8');

    const result = await call('todo.validate', { file: 'broken' });
    expect(result.isError).toBeFalsy();
    expect(result.structuredContent).toMatchObject({
      errors: [{ code: 'NESTED_HEADING', line: 3 }],
    });
  });

  it('creates named files', async () => {
    const result = await call('todo.create', { file: 'new' });
    expect(result.structuredContent).toEqual({ path: join(dir, 'new.todo') });
    expect(await readFile(join(dir, 'new.todo'), 'utf8')).toBe('');
  });

  it('maps arguments to targets', () => {
    expect(toTarget({})).toEqual({ kind: 'day', day: 'today' });
    expect(toTarget({ day: 'tomorrow' })).toEqual({ kind: 'day', day: 'tomorrow' });
    expect(toTarget({ day: 'tomorrow', file: 'work' })).toEqual({ kind: 'file', name: 'work' });
  });
});
