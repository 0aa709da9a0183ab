#!/usr/bin/env node

/**
 * Toolstream MCP Server
 * Main entry point - runs the HTTP transport or the stdio transport
 */

import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';

const USAGE = `
Toolstream MCP Server - session-oriented Streamable HTTP transport

Usage:
  toolstream [options]

Options:
  -h, --help     Show this help message
  -v, --version  Show version
  --mode <mode>  Run mode: 'http' or 'stdio' (default: TOOLSTREAM_MODE or http)

HTTP Mode:
  Serves JSON-RPC on POST /mcp with server-push event streams on GET /mcp

stdio Mode:
  Serves the same tools over stdin/stdout for locally spawned MCP clients

Examples:
  toolstream                   # Run the HTTP server
  toolstream --mode=stdio      # Run over stdin/stdout
  TOOLSTREAM_PORT=9000 toolstream
`;

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return 'unknown';
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
      mode: { type: 'string' },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  if (values.version) {
    console.log(`Toolstream MCP Server v${readVersion()}`);
    return;
  }

  const mode = values.mode ?? process.env.TOOLSTREAM_MODE ?? 'http';

  if (mode === 'stdio') {
    const { runStdioServer } = await import('./mcp.js');
    await runStdioServer();
  } else if (mode === 'http') {
    const { runHttpServer } = await import('./http.js');
    await runHttpServer();
  } else {
    console.error(`Unknown mode: ${mode} (expected 'http' or 'stdio')`);
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
