/**
 * Discovery statistics
 */

import { z } from 'zod';
import { buildGroupedCountQuery, type Predicate } from '../../adql/query-builder.js';
import { summarizeDiscoveryMethods, summarizeTimeline, type MethodShare, type YearSummary } from '../../metrics/discovery-stats.js';
import type { TapQueryExecutor } from '../../tap/tap-client.js';
import { rowsEnvelope, type EmptyEnvelope, type SuccessEnvelope } from '../envelope.js';
import { assertOrderedRange, parseToolInput, yearSchema } from '../validation.js';
import { READ_ONLY_ANNOTATIONS, type ToolDefinition } from '../tool-types.js';

export interface TimelineRange {
  startYear?: number;
  endYear?: number;
}

/**
 * Discoveries per year, with the number of distinct methods and facilities.
 */
export async function discoveryTimeline(
  tap: TapQueryExecutor,
  range: TimelineRange = {}
): Promise<SuccessEnvelope<YearSummary> | EmptyEnvelope> {
  assertOrderedRange(range.startYear, range.endYear, 'endYear');

  const filters: Predicate[] = [
    { kind: 'notNull', column: 'disc_year' },
    { kind: 'range', column: 'disc_year', min: range.startYear, max: range.endYear },
  ];
  const adql = buildGroupedCountQuery({
    groupBy: 'disc_year',
    counts: [
      { alias: 'discoveries' },
      { alias: 'methods', distinct: 'discoverymethod' },
      { alias: 'facilities', distinct: 'disc_facility' },
    ],
    filters,
    orderBy: { expression: 'disc_year', direction: 'ASC' },
  });

  return rowsEnvelope(summarizeTimeline(await tap.query(adql)), 'No discoveries in the requested years');
}

/**
 * Discoveries per method and each method's share of the total.
 */
export async function discoveryMethodStats(
  tap: TapQueryExecutor
): Promise<SuccessEnvelope<MethodShare> | EmptyEnvelope> {
  const adql = buildGroupedCountQuery({
    groupBy: 'discoverymethod',
    counts: [{ alias: 'discoveries' }],
    filters: [{ kind: 'notNull', column: 'discoverymethod' }],
    orderBy: { expression: 'discoveries', direction: 'DESC' },
  });

  return rowsEnvelope(summarizeDiscoveryMethods(await tap.query(adql)), 'No discovery methods recorded');
}

// ============================================================================
// Tool Definitions
// ============================================================================

const timelineInput = {
  startYear: yearSchema.optional().describe('First year to include (default: first discovery)'),
  endYear: yearSchema.optional().describe('Last year to include (default: latest discovery)'),
};

export const discoveryTimelineTool: ToolDefinition = {
  name: 'discovery_timeline',
  description: 'Exoplanet discoveries per year, with the number of distinct methods and facilities and a running total.',
  inputSchema: timelineInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'statistics',
  handler: async (args, ctx) => {
    try {
      const range = parseToolInput(z.object(timelineInput), args);
      return ctx.respond(await discoveryTimeline(ctx.tap, range));
    } catch (error) {
      return ctx.errorResponse('discovery_timeline', error);
    }
  },
};

export const discoveryMethodStatsTool: ToolDefinition = {
  name: 'discovery_method_stats',
  description: 'Number of exoplanets found with each discovery method and the percentage of all discoveries it represents.',
  inputSchema: {},
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'statistics',
  handler: async (_args, ctx) => {
    try {
      return ctx.respond(await discoveryMethodStats(ctx.tap));
    } catch (error) {
      return ctx.errorResponse('discovery_method_stats', error);
    }
  },
};
