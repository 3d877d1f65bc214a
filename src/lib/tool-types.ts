/**
 * Tool Types and Schemas
 *
 * Shared types and interfaces for MCP tool definitions.
 */

import type { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { TapQueryExecutor } from '../tap/tap-client.js';
import type { ResponseEnvelope } from './envelope.js';

// Re-export for convenience
export type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export type ToolCategory = 'lookup' | 'ranking' | 'statistics' | 'calculator';

/**
 * Tool definition interface.
 * Each tool file exports definitions that include metadata and handler.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodRawShape;
  annotations: {
    readOnlyHint: boolean;
    destructiveHint: boolean;
    idempotentHint: boolean;
    openWorldHint: boolean;
  };
  category: ToolCategory;
  handler: (args: Record<string, unknown>, context: ToolContext) => Promise<CallToolResult>;
}

/**
 * Context passed to tool handlers.
 */
export interface ToolContext {
  /** Runs ADQL against the archive */
  tap: TapQueryExecutor;
  respond: <T>(envelope: ResponseEnvelope<T>) => CallToolResult;
  errorResponse: (tool: string, error: unknown) => CallToolResult;
}

/**
 * Every tool only reads from the archive. Results change as the archive is
 * updated, hence not idempotent.
 */
export const READ_ONLY_ANNOTATIONS: ToolDefinition['annotations'] = Object.freeze({
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
});
