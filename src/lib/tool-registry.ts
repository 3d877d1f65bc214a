/**
 * Tool Registry
 *
 * Closed set of tool definitions, a dispatch table keyed by tool name, and
 * registration with the MCP server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { ValidationError } from '../errors.js';
import type { CallToolResult, ToolDefinition, ToolContext } from './tool-types.js';

import { getPlanetTool, compareWithEarthTool } from './tools/planets.js';
import {
  listMostMassiveTool,
  nearestPlanetsTool,
  searchByDiscoveryMethodTool,
  advancedSearchTool,
} from './tools/rankings.js';
import { discoveryTimelineTool, discoveryMethodStatsTool } from './tools/statistics.js';
import {
  calculateEscapeVelocityTool,
  assessHabitabilityTool,
  findHabitableCandidatesTool,
} from './tools/calculators.js';

/**
 * All registered tools.
 */
export const allTools: readonly ToolDefinition[] = [
  // Lookups
  getPlanetTool,
  compareWithEarthTool,

  // Rankings
  listMostMassiveTool,
  nearestPlanetsTool,
  searchByDiscoveryMethodTool,
  advancedSearchTool,

  // Statistics
  discoveryTimelineTool,
  discoveryMethodStatsTool,

  // Calculators
  calculateEscapeVelocityTool,
  assessHabitabilityTool,
  findHabitableCandidatesTool,
];

export const toolsByName: ReadonlyMap<string, ToolDefinition> = new Map(
  allTools.map(tool => [tool.name, tool])
);

/**
 * Call a tool by name without going through MCP.
 * Unknown names produce a validation error envelope.
 */
export async function invokeTool(
  name: string,
  args: Record<string, unknown>,
  context: ToolContext
): Promise<CallToolResult> {
  const tool = toolsByName.get(name);
  if (!tool) {
    return context.errorResponse(name, new ValidationError('tool', `unknown tool '${name}'`));
  }
  return tool.handler(args, context);
}

/**
 * Register all tools with the MCP server.
 *
 * The SDK lists the tools with their JSON Schema. Calls are dispatched
 * through invokeTool, so rejected arguments come back as a validation
 * envelope naming the field.
 */
export function registerAllTools(server: McpServer, context: ToolContext): void {
  for (const tool of allTools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputSchema,
        annotations: tool.annotations,
        _meta: { category: tool.category },
      },
      (args) => tool.handler(args, context)
    );
  }

  // Replaces the SDK's call handler, which validates before the tool does
  server.server.setRequestHandler(CallToolRequestSchema, (request) =>
    invokeTool(request.params.name, request.params.arguments ?? {}, context)
  );
}
