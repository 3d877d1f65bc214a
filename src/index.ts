#!/usr/bin/env node
/**
 * exoplanet-archive-mcp CLI Entry Point
 *
 * Starts the MCP server with configurable transport:
 * - stdio (default): For Claude Desktop and local tools
 * - http: For network access using Streamable HTTP transport (stateless)
 *
 * @example
 * ```bash
 * # Default: stdio transport
 * exoplanet-archive-mcp
 *
 * # Network: Streamable HTTP transport
 * exoplanet-archive-mcp --transport http --port 3000 --host 0.0.0.0
 * ```
 */

import { createServer as createHttpServer, type Server } from 'node:http';
import { parseArgs } from 'node:util';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { closeTapOnDisconnect, createServer } from './service/http-server.js';
import { TapClient } from './tap/tap-client.js';
import { config } from './config.js';

// =============================================================================
// Library API Re-exports (for direct use without MCP)
// =============================================================================

// Query construction
export {
  buildRankedQuery,
  buildLookupQuery,
  buildGroupedCountQuery,
  quoteString,
} from './adql/query-builder.js';
export type { Predicate, Ordering, RankedQuerySpec, LookupQuerySpec, GroupedCountQuerySpec } from './adql/query-builder.js';
export { DISCOVERY_METHODS, DISCOVERY_LOCALES, SORTABLE_COLUMNS } from './adql/columns.js';

// TAP access
export { TapClient } from './tap/tap-client.js';
export type { TapQueryExecutor, TapRow, TapClientOptions } from './tap/tap-client.js';
export type { PlanetRecord } from './archive/planet-record.js';

// Derived metrics
export { computeEscapeVelocity, escapeVelocityKms, surfaceGravity } from './metrics/escape-velocity.js';
export type { EscapeVelocityMetrics } from './metrics/escape-velocity.js';
export { assessHabitability, GOLDILOCKS_BOUNDS } from './metrics/habitability.js';
export type { HabitabilityAssessment } from './metrics/habitability.js';
export { compareWithEarth } from './metrics/earth-comparison.js';
export { evaluateEach } from './metrics/batch.js';

// Errors and envelopes
export { ValidationError, ServiceError, MissingDataError } from './errors.js';
export type { ErrorCode, ServiceErrorKind } from './errors.js';
export type { ResponseEnvelope } from './lib/envelope.js';

// Tools and server
export { allTools, toolsByName, invokeTool } from './lib/tool-registry.js';
export { createServer, createToolContext, closeTapOnDisconnect } from './service/http-server.js';

// Configuration
export { config } from './config.js';
export type { Config } from './config.js';

// =============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// =============================================================================

function showHelp(): void {
  console.log(`
exoplanet-archive-mcp - MCP server for the NASA Exoplanet Archive

Usage:
  exoplanet-archive-mcp [options]

Options:
  -t, --transport <type>  Transport type: stdio (default), http
  -p, --port <port>       Port for HTTP transport (default: 3000)
  -h, --host <host>       Host for HTTP transport (default: 127.0.0.1)
  --help                  Show this help

Environment:
  EXO_TAP_URL             TAP service (default: ${config.tap.url})
  EXO_TAP_TIMEOUT_MS      Query timeout in ms (default: 60000)
  EXO_MCP_DEBUG=1         Prefix error messages with the tool name
  EXO_TRACE=1             Log ADQL traffic to ./logs (or EXO_TRACE_DIR)
`);
}

function startHttpServer(host: string, port: number): Server {
  // Stateless: every request gets its own server and transport; the TAP client is shared
  const tap = new TapClient();
  const httpServer = createHttpServer(async (req, res) => {
    const url = new URL(req.url || '/', `http://${req.headers.host}`);

    if (req.method === 'GET' && url.pathname === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok', transport: 'streamable-http', tap: config.tap.url }));
      return;
    }

    if (url.pathname === '/mcp') {
      try {
        const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
        const server = createServer({ tap });
        res.on('close', () => {
          transport.close().catch(error => console.error('Transport close failed:', error));
          server.close().catch(error => console.error('Server close failed:', error));
        });
        await server.connect(transport);
        await transport.handleRequest(req, res);
      } catch (error) {
        console.error('MCP request failed:', error);
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: 'Internal server error' }));
        }
      }
      return;
    }

    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'Not found. Use /mcp for MCP requests or /health for status.' }));
  });

  httpServer.listen(port, host, () => {
    console.error(`exoplanet-archive-mcp running on http://${host}:${port}`);
    console.error(`  MCP endpoint: http://${host}:${port}/mcp`);
    console.error(`  Health check: http://${host}:${port}/health`);
  });

  process.on('SIGINT', () => {
    console.error('\nShutting down...');
    httpServer.close();
    tap.close();
    process.exit(0);
  });

  return httpServer;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      transport: { type: 'string', short: 't', default: 'stdio' },
      port: { type: 'string', short: 'p', default: '3000' },
      host: { type: 'string', short: 'h', default: '127.0.0.1' },
      help: { type: 'boolean' },
    },
    allowPositionals: false,
  });

  if (values.help) {
    showHelp();
    return;
  }

  if (values.transport === 'http') {
    startHttpServer(values.host ?? '127.0.0.1', Number.parseInt(values.port ?? '3000', 10));
  } else {
    // Default: stdio transport
    const tap = new TapClient();
    const server = createServer({ tap });
    closeTapOnDisconnect(server, tap);
    await server.connect(new StdioServerTransport());

    const shutdown = (): void => {
      server.close()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('Server close failed:', error);
          process.exit(1);
        });
    };
    process.on('SIGINT', shutdown);
    process.stdin.on('end', shutdown);
    console.error(`exoplanet-archive-mcp on stdio (tap: ${config.tap.url})`);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
