/**
 * MCP server tests over an in-memory transport
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { closeTapOnDisconnect, createServer } from '../../../src/service/http-server.js';
import { allTools } from '../../../src/lib/tool-registry.js';
import { ServiceError } from '../../../src/errors.js';
import { expectError, expectSuccess, failingTap, fakeTap, FakeTap, KEPLER_442B } from '../helpers/test-setup.js';

interface Connection {
  server: McpServer;
  client: Client;
}

async function connect(tap: FakeTap): Promise<Connection> {
  const server = createServer({ tap, debug: false });
  const client = new Client({ name: 'test-client', version: '1.0.0' });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return { server, client };
}

async function callTool(client: Client, name: string, args: Record<string, unknown>): Promise<CallToolResult> {
  return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
}

describe('SERVER', () => {
  let tap: FakeTap;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    tap = fakeTap([KEPLER_442B]);
    ({ server, client } = await connect(tap));
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('lists every registered tool as read-only', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(tool => tool.name).sort()).toEqual(allTools.map(tool => tool.name).sort());
    for (const tool of tools) {
      expect(tool.annotations?.readOnlyHint).toBe(true);
    }
  });

  it('calls a tool and returns its envelope', async () => {
    const result = await callTool(client, 'calculate_escape_velocity', { names: 'Kepler-442 b' });

    const envelope = expectSuccess(result);
    expect(envelope.data[0]).toMatchObject({ pl_name: 'Kepler-442 b', escapeVelocityKms: 14.84 });
    expect(tap.queries).toHaveLength(1);
  });

  describe('rejected arguments', () => {
    it('answers a non-positive count with a validation envelope', async () => {
      const envelope = expectError(await callTool(client, 'list_most_massive', { count: 0 }));
      expect(envelope).toEqual({
        status: 'error',
        errorType: 'validation',
        message: 'Invalid value for "count": must be greater than 0',
        field: 'count',
      });
      expect(tap.queries).toHaveLength(0);
    });

    it('names an unknown discovery method', async () => {
      const envelope = expectError(await callTool(client, 'search_by_discovery_method', { method: 'Telepathy' }));
      expect(envelope.errorType).toBe('validation');
      expect(envelope.field).toBe('method');
    });

    it('names a blank entry of a batch', async () => {
      const envelope = expectError(
        await callTool(client, 'calculate_escape_velocity', { names: ['Kepler-442 b', ' '] })
      );
      expect(envelope.errorType).toBe('validation');
      expect(envelope.field).toBe('names.1');
      expect(envelope.message).toBe('Invalid value for "names.1": must not be empty');
    });

    it('answers an unknown tool with a validation envelope', async () => {
      const envelope = expectError(await callTool(client, 'warp_drive', {}));
      expect(envelope.field).toBe('tool');
    });
  });

  it('passes service failures through as envelopes', async () => {
    const down = await connect(failingTap(new ServiceError('unreachable', 'TAP service unreachable: connect ECONNREFUSED')));
    try {
      const envelope = expectError(await callTool(down.client, 'nearest_planets', {}));
      expect(envelope).toEqual({
        status: 'error',
        errorType: 'service_unreachable',
        message: 'TAP service unreachable: connect ECONNREFUSED',
      });
    } finally {
      await down.client.close();
      await down.server.close();
    }
  });

  it('closes the TAP client when the transport closes', async () => {
    const owned = fakeTap();
    const connection = await connect(owned);
    closeTapOnDisconnect(connection.server, owned);

    expect(owned.closed).toBe(false);
    await connection.client.close();
    expect(owned.closed).toBe(true);
  });

  it('serves the habitability bounds as a resource', async () => {
    const { contents } = await client.readResource({ uri: 'exoplanet://habitability-criteria' });
    const [item] = contents;
    if (!item || !('text' in item) || typeof item.text !== 'string') {
      throw new Error('Resource has no text content');
    }

    const criteria = JSON.parse(item.text);
    expect(criteria.inclusive).toBe(false);
    expect(criteria.bounds.temperature).toEqual({ min: 200, max: 320, unit: 'K' });
  });

  it('offers the workflow prompts', async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map(prompt => prompt.name).sort()).toEqual(['explore-planet', 'habitable-survey']);

    const prompt = await client.getPrompt({ name: 'explore-planet', arguments: { name: 'Kepler-442 b' } });
    const [message] = prompt.messages;
    expect(message.content.type).toBe('text');
    if (message.content.type === 'text') {
      expect(message.content.text).toContain('get_planet with name="Kepler-442 b"');
    }
  });
});
