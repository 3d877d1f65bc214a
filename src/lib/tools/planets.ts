/**
 * Single-planet lookups
 */

import { z } from 'zod';
import { buildLookupQuery } from '../../adql/query-builder.js';
import { COMPARISON_COLUMNS, DETAIL_COLUMNS, NAME_COLUMN } from '../../adql/columns.js';
import { toPlanetRecords, type PlanetRecord } from '../../archive/planet-record.js';
import { compareWithEarth, type EarthComparison } from '../../metrics/earth-comparison.js';
import type { TapQueryExecutor } from '../../tap/tap-client.js';
import { emptyEnvelope, rowsEnvelope, successEnvelope, type EmptyEnvelope, type SuccessEnvelope } from '../envelope.js';
import { parseToolInput, planetNameSchema } from '../validation.js';
import { READ_ONLY_ANNOTATIONS, type ToolDefinition } from '../tool-types.js';

export type PlanetComparison = PlanetRecord & EarthComparison;

function notFoundMessage(name: string): string {
  return `No planet named '${name}' in the archive`;
}

async function lookupByName(tap: TapQueryExecutor, name: string, columns: readonly string[]): Promise<PlanetRecord[]> {
  const adql = buildLookupQuery({
    columns,
    filters: [{ kind: 'equals', column: NAME_COLUMN, value: name }],
  });
  return toPlanetRecords(await tap.query(adql));
}

/**
 * Full discovery and physical record of one planet.
 */
export async function getPlanet(
  tap: TapQueryExecutor,
  name: string
): Promise<SuccessEnvelope<PlanetRecord> | EmptyEnvelope> {
  const records = await lookupByName(tap, name, DETAIL_COLUMNS);
  return rowsEnvelope(records, notFoundMessage(name));
}

/**
 * One planet side by side with Earth.
 */
export async function comparePlanetWithEarth(
  tap: TapQueryExecutor,
  name: string
): Promise<SuccessEnvelope<PlanetComparison> | EmptyEnvelope> {
  const [record] = await lookupByName(tap, name, COMPARISON_COLUMNS);
  if (!record) {
    return emptyEnvelope(notFoundMessage(name));
  }
  return successEnvelope([{ ...record, ...compareWithEarth(record) }]);
}

// ============================================================================
// Tool Definitions
// ============================================================================

const nameInput = {
  name: planetNameSchema.describe('Planet name exactly as listed in the archive, e.g. "Kepler-442 b" or "Proxima Cen b"'),
};

export const getPlanetTool: ToolDefinition = {
  name: 'get_planet',
  description: 'Look up one exoplanet: mass, radius, orbit, temperature, distance and discovery details (method, year, facility, telescope, reference).',
  inputSchema: nameInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'lookup',
  handler: async (args, ctx) => {
    try {
      const { name } = parseToolInput(z.object(nameInput), args);
      return ctx.respond(await getPlanet(ctx.tap, name));
    } catch (error) {
      return ctx.errorResponse('get_planet', error);
    }
  },
};

export const compareWithEarthTool: ToolDefinition = {
  name: 'compare_with_earth',
  description: 'Compare an exoplanet with Earth: orbital period in Earth years, relative gravity and density, and a mass class. pl_masse and pl_rade are already in Earth units.',
  inputSchema: nameInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'lookup',
  handler: async (args, ctx) => {
    try {
      const { name } = parseToolInput(z.object(nameInput), args);
      return ctx.respond(await comparePlanetWithEarth(ctx.tap, name));
    } catch (error) {
      return ctx.errorResponse('compare_with_earth', error);
    }
  },
};
