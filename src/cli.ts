#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * This module is intentionally tiny:
 * - Parse CLI flags into a `ConfigLocation`.
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { runStdioServer } from './server.js';
import { loadConfigFromArgs } from './config.js';

const VERSION = '0.1.0';

function printHelp(): void {
  process.stdout.write(
    [
      'daytodo-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  daytodo-mcp [--config <file>] [--directory <dir>]',
      '',
      'Options:',
      '  --config     Config file (default: $XDG_CONFIG_HOME/daytodo/config.json)',
      '  --directory  Todo directory (overrides the config file)',
      '  --help       Show help',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

/**
 * Parse args and run the stdio server.
 */
async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`daytodo-mcp ${VERSION}\n`);
    return;
  }

  const location = loadConfigFromArgs(argv, process.cwd());
  await runStdioServer(location);
}

await main();
