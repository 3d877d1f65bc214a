/**
 * Derived-metric tools: escape velocity and the Goldilocks screen.
 */

import { z } from 'zod';
import { buildLookupQuery, buildRankedQuery } from '../../adql/query-builder.js';
import { HABITABLE_COLUMNS, METRIC_COLUMNS, NAME_COLUMN } from '../../adql/columns.js';
import { toPlanetRecords, type PlanetRecord } from '../../archive/planet-record.js';
import { evaluateEach, notFoundFailures } from '../../metrics/batch.js';
import { computeEscapeVelocity, type EscapeVelocityMetrics } from '../../metrics/escape-velocity.js';
import { assessHabitability, goldilocksPredicates, type HabitabilityAssessment } from '../../metrics/habitability.js';
import type { TapQueryExecutor } from '../../tap/tap-client.js';
import {
  batchEnvelope,
  emptyEnvelope,
  type EmptyEnvelope,
  type ErrorEnvelope,
  type SuccessEnvelope,
} from '../envelope.js';
import { countSchema, parseToolInput, planetNamesSchema } from '../validation.js';
import { READ_ONLY_ANNOTATIONS, type ToolDefinition } from '../tool-types.js';

export const MAX_HABITABLE = 100;

export type HabitableCandidate = PlanetRecord & { habitability: HabitabilityAssessment };

/**
 * Fetch the named planets, in the order they were asked for.
 */
async function fetchByNames(tap: TapQueryExecutor, names: readonly string[]): Promise<PlanetRecord[]> {
  const adql = buildLookupQuery({
    columns: METRIC_COLUMNS,
    filters: [{ kind: 'in', column: NAME_COLUMN, values: names }],
  });
  const records = toPlanetRecords(await tap.query(adql));
  const position = new Map(names.map((name, index) => [name, index]));
  return records.sort((a, b) => (position.get(a.pl_name) ?? names.length) - (position.get(b.pl_name) ?? names.length));
}

async function evaluateNamed<T>(
  tap: TapQueryExecutor,
  names: readonly string[],
  compute: (record: PlanetRecord) => T
): Promise<SuccessEnvelope<T> | ErrorEnvelope> {
  const records = await fetchByNames(tap, names);
  const result = evaluateEach(records, compute);
  return batchEnvelope({
    data: result.data,
    failures: [...result.failures, ...notFoundFailures(names, records)],
  });
}

/**
 * Escape velocity for each named planet. Planets without mass or radius are
 * reported as failures next to the ones that computed.
 */
export function calculateEscapeVelocities(
  tap: TapQueryExecutor,
  names: readonly string[]
): Promise<SuccessEnvelope<EscapeVelocityMetrics> | ErrorEnvelope> {
  return evaluateNamed(tap, names, computeEscapeVelocity);
}

export function assessHabitabilityOf(
  tap: TapQueryExecutor,
  names: readonly string[]
): Promise<SuccessEnvelope<HabitabilityAssessment> | ErrorEnvelope> {
  return evaluateNamed(tap, names, assessHabitability);
}

/**
 * Planets inside the Goldilocks bounds, most Earth-like mass first.
 */
export async function findHabitableCandidates(
  tap: TapQueryExecutor,
  count: number
): Promise<SuccessEnvelope<HabitableCandidate> | ErrorEnvelope | EmptyEnvelope> {
  const adql = buildRankedQuery({
    columns: HABITABLE_COLUMNS,
    filters: goldilocksPredicates(),
    orderBy: { expression: 'ABS(pl_masse - 1.0)', direction: 'ASC' },
    limit: count,
  });
  const records = toPlanetRecords(await tap.query(adql));
  if (records.length === 0) {
    return emptyEnvelope('No planets inside the habitability bounds');
  }
  return batchEnvelope(evaluateEach(records, record => ({ ...record, habitability: assessHabitability(record) })));
}

// ============================================================================
// Tool Definitions
// ============================================================================

const namesInput = {
  names: planetNamesSchema.describe('One planet name or a list of up to 25, e.g. ["Kepler-442 b", "TRAPPIST-1 e"]'),
};

export const calculateEscapeVelocityTool: ToolDefinition = {
  name: 'calculate_escape_velocity',
  description: 'Escape velocity v = √(2GM/R) in km/s for one or more planets, compared with Earth (11.2 km/s), with surface gravity and what it means for keeping an atmosphere. Planets without mass or radius are listed under failures.',
  inputSchema: namesInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'calculator',
  handler: async (args, ctx) => {
    try {
      const { names } = parseToolInput(z.object(namesInput), args);
      return ctx.respond(await calculateEscapeVelocities(ctx.tap, names));
    } catch (error) {
      return ctx.errorResponse('calculate_escape_velocity', error);
    }
  },
};

export const assessHabitabilityTool: ToolDefinition = {
  name: 'assess_habitability',
  description: 'Goldilocks screen for one or more planets: equilibrium temperature 200-320 K, orbital period 100-500 days, mass 0.5-10 Earth masses. A rough approximation, not a scientific assessment.',
  inputSchema: namesInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'calculator',
  handler: async (args, ctx) => {
    try {
      const { names } = parseToolInput(z.object(namesInput), args);
      return ctx.respond(await assessHabitabilityOf(ctx.tap, names));
    } catch (error) {
      return ctx.errorResponse('assess_habitability', error);
    }
  },
};

const habitableInput = {
  count: countSchema(MAX_HABITABLE).default(10).describe(`Maximum results (default 10, max ${MAX_HABITABLE})`),
};

export const findHabitableCandidatesTool: ToolDefinition = {
  name: 'find_habitable_candidates',
  description: 'Find potentially habitable exoplanets inside the Goldilocks bounds (200-320 K, 100-500 day orbits, 0.5-10 Earth masses), closest to one Earth mass first.',
  inputSchema: habitableInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'calculator',
  handler: async (args, ctx) => {
    try {
      const { count } = parseToolInput(z.object(habitableInput), args);
      return ctx.respond(await findHabitableCandidates(ctx.tap, count));
    } catch (error) {
      return ctx.errorResponse('find_habitable_candidates', error);
    }
  },
};
