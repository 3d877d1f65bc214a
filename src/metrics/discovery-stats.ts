/**
 * Discovery statistics computed from grouped-count rows.
 */

import { z } from 'zod';
import { ServiceError } from '../errors.js';
import type { TapRow } from '../tap/tap-client.js';
import { round } from './constants.js';

const methodCountSchema = z.object({
  discoverymethod: z.string(),
  discoveries: z.number().int().nonnegative(),
});

const yearCountSchema = z.object({
  disc_year: z.number().int(),
  discoveries: z.number().int().nonnegative(),
  methods: z.number().int().nonnegative(),
  facilities: z.number().int().nonnegative(),
});

export interface MethodShare {
  discoverymethod: string;
  discoveries: number;
  /** Share of all discoveries, in percent */
  percentage: number;
}

export type YearSummary = z.infer<typeof yearCountSchema> & {
  /** Discoveries up to and including this year, within the requested range */
  cumulative: number;
};

function parseRows<T>(schema: z.ZodType<T>, rows: readonly TapRow[], what: string): T[] {
  return rows.map((row, index) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new ServiceError('malformed_response', `Row ${index} is not a ${what}: ${parsed.error.issues[0].message}`);
    }
    return parsed.data;
  });
}

/**
 * Share of each method, largest first (ties by method name).
 */
export function summarizeDiscoveryMethods(rows: readonly TapRow[]): MethodShare[] {
  const counts = parseRows(methodCountSchema, rows, 'method count');
  const total = counts.reduce((sum, row) => sum + row.discoveries, 0);

  return counts
    .map(row => ({
      discoverymethod: row.discoverymethod,
      discoveries: row.discoveries,
      percentage: total === 0 ? 0 : round((row.discoveries * 100) / total),
    }))
    .sort((a, b) => b.discoveries - a.discoveries || a.discoverymethod.localeCompare(b.discoverymethod));
}

/**
 * Per-year counts in ascending year order with a running total.
 */
export function summarizeTimeline(rows: readonly TapRow[]): YearSummary[] {
  const years = parseRows(yearCountSchema, rows, 'yearly count')
    .sort((a, b) => a.disc_year - b.disc_year);

  let cumulative = 0;
  return years.map(year => {
    cumulative += year.discoveries;
    return { ...year, cumulative };
  });
}
