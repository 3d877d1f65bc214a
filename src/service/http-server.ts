import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { config } from '../config.js';
import { COLUMN_GUIDE } from '../config/mcp-resources.js';
import { DISCOVERY_LOCALES, DISCOVERY_METHODS } from '../adql/columns.js';
import { GOLDILOCKS_BOUNDS } from '../metrics/habitability.js';
import { TapClient, type TapQueryExecutor } from '../tap/tap-client.js';
import { errorEnvelope, toToolResult } from '../lib/envelope.js';
import { registerAllTools } from '../lib/tool-registry.js';
import type { ToolContext } from '../lib/tool-types.js';

export interface ServerOptions {
  /** Query executor (default: a TapClient on config.tap.url) */
  tap?: TapQueryExecutor;
  /** Prefix error messages with the tool name (default: config.debug) */
  debug?: boolean;
}

/**
 * Build the context handed to every tool handler.
 */
export function createToolContext(tap: TapQueryExecutor, debug: boolean = config.debug): ToolContext {
  return {
    tap,
    respond: toToolResult,
    errorResponse: (tool, error) => toToolResult(errorEnvelope(error, debug ? tool : undefined)),
  };
}

/**
 * Close a TAP client once the server's transport closes.
 */
export function closeTapOnDisconnect(server: McpServer, tap: Pick<TapClient, 'close'>): void {
  const previous = server.server.onclose;
  server.server.onclose = () => {
    previous?.();
    tap.close();
  };
}

export function createServer(options: ServerOptions = {}): McpServer {
  const server = new McpServer({
    name: 'exoplanet-archive-mcp',
    version: '0.1.0',
  });

  const context = createToolContext(options.tap ?? new TapClient(), options.debug);

  // Register all tools from the tool registry
  registerAllTools(server, context);

  // =============================================================================
  // MCP Resources (documentation)
  // =============================================================================

  server.resource(
    'column-guide',
    'exoplanet://columns',
    async () => ({
      contents: [{
        uri: 'exoplanet://columns',
        mimeType: 'text/markdown',
        text: COLUMN_GUIDE,
      }],
    })
  );

  server.resource(
    'habitability-criteria',
    'exoplanet://habitability-criteria',
    async () => ({
      contents: [{
        uri: 'exoplanet://habitability-criteria',
        mimeType: 'application/json',
        text: JSON.stringify({
          bounds: GOLDILOCKS_BOUNDS,
          inclusive: false,
          note: 'Approximation for browsing the catalog, not a scientific habitability assessment.',
        }, null, 2),
      }],
    })
  );

  server.resource(
    'discovery-methods',
    'exoplanet://discovery-methods',
    async () => ({
      contents: [{
        uri: 'exoplanet://discovery-methods',
        mimeType: 'application/json',
        text: JSON.stringify({
          methods: DISCOVERY_METHODS,
          locales: DISCOVERY_LOCALES,
        }, null, 2),
      }],
    })
  );

  // =============================================================================
  // MCP Prompts (workflow templates)
  // =============================================================================

  server.prompt(
    'explore-planet',
    {
      name: z.string().describe('Planet name (e.g., "Kepler-442 b")'),
    },
    async (args) => ({
      messages: [{
        role: 'user',
        content: {
          type: 'text',
          text: `Give me a profile of ${args.name}:

1. get_planet with name="${args.name}" for its discovery and physical data
2. compare_with_earth to put its orbit, gravity and density in Earth terms
3. calculate_escape_velocity to judge whether it can hold an atmosphere
4. assess_habitability for the Goldilocks screen

If the planet lacks mass or radius, say which calculations could not be done.`,
        },
      }],
    })
  );

  server.prompt(
    'habitable-survey',
    {
      count: z.string().optional().describe('How many candidates to list (e.g., "10")'),
    },
    async (args) => ({
      messages: [{
        role: 'user',
        content: {
          type: 'text',
          text: `Survey potentially habitable exoplanets:

1. find_habitable_candidates with count=${args.count || '10'}
2. calculate_escape_velocity for the candidates that have a radius
3. nearest_planets to see whether any candidate is also close to us

Summarize the best candidates and remember the screen is only an approximation.`,
        },
      }],
    })
  );

  return server;
}
