/**
 * Ranked listings: top-n queries ordered over the whole table.
 */

import { z } from 'zod';
import { buildRankedQuery, type Predicate, type SortDirection } from '../../adql/query-builder.js';
import {
  DISCOVERY_LOCALES,
  DISCOVERY_METHODS,
  MASSIVE_COLUMNS,
  METHOD_COLUMNS,
  NEAREST_COLUMNS,
  SEARCH_COLUMNS,
  SORTABLE_COLUMNS,
  type DiscoveryLocale,
  type DiscoveryMethod,
  type SortableColumn,
} from '../../adql/columns.js';
import { toPlanetRecords, type PlanetRecord } from '../../archive/planet-record.js';
import type { TapQueryExecutor } from '../../tap/tap-client.js';
import { rowsEnvelope, type EmptyEnvelope, type SuccessEnvelope } from '../envelope.js';
import {
  assertOrderedRange,
  countSchema,
  nonNegativeSchema,
  parseToolInput,
  substringSchema,
  yearSchema,
} from '../validation.js';
import { READ_ONLY_ANNOTATIONS, type ToolDefinition } from '../tool-types.js';

type PlanetList = SuccessEnvelope<PlanetRecord> | EmptyEnvelope;

export const MAX_MASSIVE = 500;
export const MAX_NEAREST = 100;
export const MAX_BY_METHOD = 200;
export const MAX_SEARCH = 200;

/**
 * The `count` heaviest planets with a known mass (Earth masses; 1 Jupiter mass ≈ 318).
 */
export async function listMostMassive(tap: TapQueryExecutor, count: number): Promise<PlanetList> {
  const adql = buildRankedQuery({
    columns: MASSIVE_COLUMNS,
    filters: [{ kind: 'notNull', column: 'pl_masse' }],
    orderBy: { expression: 'pl_masse', direction: 'DESC' },
    limit: count,
  });
  const records = toPlanetRecords(await tap.query(adql));
  return rowsEnvelope(records, 'No planets with a known mass');
}

/**
 * The `count` planets closest to the Sun.
 */
export async function listNearest(tap: TapQueryExecutor, count: number): Promise<PlanetList> {
  const adql = buildRankedQuery({
    columns: NEAREST_COLUMNS,
    filters: [{ kind: 'notNull', column: 'sy_dist' }],
    orderBy: { expression: 'sy_dist', direction: 'ASC' },
    limit: count,
  });
  const records = toPlanetRecords(await tap.query(adql));
  return rowsEnvelope(records, 'No planets with a known distance');
}

/**
 * Most recent discoveries made with one method.
 */
export async function searchByDiscoveryMethod(
  tap: TapQueryExecutor,
  method: DiscoveryMethod,
  limit: number
): Promise<PlanetList> {
  const adql = buildRankedQuery({
    columns: METHOD_COLUMNS,
    filters: [{ kind: 'equals', column: 'discoverymethod', value: method }],
    orderBy: { expression: 'disc_year', direction: 'DESC' },
    limit,
  });
  const records = toPlanetRecords(await tap.query(adql));
  return rowsEnvelope(records, `No planets discovered by ${method}`);
}

export interface AdvancedSearchFilters {
  massMin?: number;
  massMax?: number;
  radiusMin?: number;
  radiusMax?: number;
  periodMin?: number;
  periodMax?: number;
  distanceMax?: number;
  temperatureMin?: number;
  temperatureMax?: number;
  minDiscoveryYear?: number;
  method?: DiscoveryMethod;
  locale?: DiscoveryLocale;
  hostname?: string;
  nameContains?: string;
  sortBy: SortableColumn;
  order: 'asc' | 'desc';
  limit: number;
}

/**
 * Translate search filters into predicates. Bounds are inclusive.
 */
export function advancedSearchPredicates(filters: AdvancedSearchFilters): Predicate[] {
  assertOrderedRange(filters.massMin, filters.massMax, 'massMax');
  assertOrderedRange(filters.radiusMin, filters.radiusMax, 'radiusMax');
  assertOrderedRange(filters.periodMin, filters.periodMax, 'periodMax');
  assertOrderedRange(filters.temperatureMin, filters.temperatureMax, 'temperatureMax');

  const predicates: Predicate[] = [
    { kind: 'range', column: 'pl_masse', min: filters.massMin, max: filters.massMax },
    { kind: 'range', column: 'pl_rade', min: filters.radiusMin, max: filters.radiusMax },
    { kind: 'range', column: 'pl_orbper', min: filters.periodMin, max: filters.periodMax },
    { kind: 'range', column: 'sy_dist', max: filters.distanceMax },
    { kind: 'range', column: 'pl_eqt', min: filters.temperatureMin, max: filters.temperatureMax },
    { kind: 'range', column: 'disc_year', min: filters.minDiscoveryYear },
  ];
  if (filters.method) predicates.push({ kind: 'equals', column: 'discoverymethod', value: filters.method });
  if (filters.locale) predicates.push({ kind: 'equals', column: 'disc_locale', value: filters.locale });
  if (filters.hostname) predicates.push({ kind: 'equals', column: 'hostname', value: filters.hostname });
  if (filters.nameContains) predicates.push({ kind: 'contains', column: 'pl_name', value: filters.nameContains });

  // Rows without a value for the sort column would otherwise lead descending lists
  if (filters.sortBy !== 'pl_name') predicates.push({ kind: 'notNull', column: filters.sortBy });

  return predicates;
}

export async function advancedSearch(tap: TapQueryExecutor, filters: AdvancedSearchFilters): Promise<PlanetList> {
  const direction: SortDirection = filters.order === 'asc' ? 'ASC' : 'DESC';
  const adql = buildRankedQuery({
    columns: SEARCH_COLUMNS,
    filters: advancedSearchPredicates(filters),
    orderBy: { expression: filters.sortBy, direction },
    limit: filters.limit,
  });
  const records = toPlanetRecords(await tap.query(adql));
  return rowsEnvelope(records, 'No planets match the given filters');
}

// ============================================================================
// Tool Definitions
// ============================================================================

const massiveInput = {
  count: countSchema(MAX_MASSIVE).describe(`Number of planets to return (max ${MAX_MASSIVE})`),
};

export const listMostMassiveTool: ToolDefinition = {
  name: 'list_most_massive',
  description: 'List the most massive known exoplanets, heaviest first. Masses are in Earth masses (1 Jupiter mass ≈ 318 Earth masses).',
  inputSchema: massiveInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'ranking',
  handler: async (args, ctx) => {
    try {
      const { count } = parseToolInput(z.object(massiveInput), args);
      return ctx.respond(await listMostMassive(ctx.tap, count));
    } catch (error) {
      return ctx.errorResponse('list_most_massive', error);
    }
  },
};

const nearestInput = {
  count: countSchema(MAX_NEAREST).default(10).describe(`Number of planets to return (default 10, max ${MAX_NEAREST})`),
};

export const nearestPlanetsTool: ToolDefinition = {
  name: 'nearest_planets',
  description: 'List the exoplanets closest to Earth, with distance in parsecs, mass, radius, orbit and temperature.',
  inputSchema: nearestInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'ranking',
  handler: async (args, ctx) => {
    try {
      const { count } = parseToolInput(z.object(nearestInput), args);
      return ctx.respond(await listNearest(ctx.tap, count));
    } catch (error) {
      return ctx.errorResponse('nearest_planets', error);
    }
  },
};

const methodInput = {
  method: z.enum(DISCOVERY_METHODS).describe('Discovery method, e.g. "Transit", "Radial Velocity", "Imaging", "Microlensing"'),
  limit: countSchema(MAX_BY_METHOD).default(20).describe(`Maximum results (default 20, max ${MAX_BY_METHOD})`),
};

export const searchByDiscoveryMethodTool: ToolDefinition = {
  name: 'search_by_discovery_method',
  description: 'List exoplanets found with a given discovery method, most recent discoveries first.',
  inputSchema: methodInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'ranking',
  handler: async (args, ctx) => {
    try {
      const { method, limit } = parseToolInput(z.object(methodInput), args);
      return ctx.respond(await searchByDiscoveryMethod(ctx.tap, method, limit));
    } catch (error) {
      return ctx.errorResponse('search_by_discovery_method', error);
    }
  },
};

const searchInput = {
  massMin: nonNegativeSchema.optional().describe('Minimum mass in Earth masses'),
  massMax: nonNegativeSchema.optional().describe('Maximum mass in Earth masses'),
  radiusMin: nonNegativeSchema.optional().describe('Minimum radius in Earth radii'),
  radiusMax: nonNegativeSchema.optional().describe('Maximum radius in Earth radii'),
  periodMin: nonNegativeSchema.optional().describe('Minimum orbital period in days'),
  periodMax: nonNegativeSchema.optional().describe('Maximum orbital period in days'),
  distanceMax: nonNegativeSchema.optional().describe('Maximum distance in parsecs'),
  temperatureMin: nonNegativeSchema.optional().describe('Minimum equilibrium temperature in K'),
  temperatureMax: nonNegativeSchema.optional().describe('Maximum equilibrium temperature in K'),
  minDiscoveryYear: yearSchema.optional().describe('Earliest discovery year'),
  method: z.enum(DISCOVERY_METHODS).optional().describe('Discovery method'),
  locale: z.enum(DISCOVERY_LOCALES).optional().describe('Where the discovery was made: "Ground", "Space" or "Multiple"'),
  hostname: z.string().trim().min(1).max(200).optional().describe('Host star name, exact match'),
  nameContains: substringSchema.optional().describe('Substring of the planet name (case-sensitive)'),
  sortBy: z.enum(SORTABLE_COLUMNS).default('disc_year').describe('Column to order by (default disc_year)'),
  order: z.enum(['asc', 'desc']).default('desc').describe('Sort direction (default desc)'),
  limit: countSchema(MAX_SEARCH).default(50).describe(`Maximum results (default 50, max ${MAX_SEARCH})`),
};

export const advancedSearchTool: ToolDefinition = {
  name: 'advanced_search',
  description: 'Search exoplanets with combined filters: mass, radius, period, temperature and distance ranges, discovery year, method, locale, host star and name.',
  inputSchema: searchInput,
  annotations: READ_ONLY_ANNOTATIONS,
  category: 'ranking',
  handler: async (args, ctx) => {
    try {
      const filters = parseToolInput(z.object(searchInput), args);
      return ctx.respond(await advancedSearch(ctx.tap, filters));
    } catch (error) {
      return ctx.errorResponse('advanced_search', error);
    }
  },
};
