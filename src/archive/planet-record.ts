/**
 * Planet records
 *
 * A row of pscomppars as this server reads it. Queries select different column
 * sets, so every column other than pl_name may be missing, and the archive
 * leaves many of them null.
 */

import { z } from 'zod';
import { ServiceError } from '../errors.js';
import type { TapRow } from '../tap/tap-client.js';

const optionalNumber = z.number().nullable().optional();
const optionalString = z.string().nullable().optional();

export const planetRecordSchema = z.object({
  pl_name: z.string(),
  hostname: optionalString,
  /** Mass in Earth masses (often a minimum mass) */
  pl_masse: optionalNumber,
  /** Radius in Earth radii */
  pl_rade: optionalNumber,
  /** Orbital period in days */
  pl_orbper: optionalNumber,
  /** Semi-major axis in AU */
  pl_orbsmax: optionalNumber,
  /** Equilibrium temperature in K */
  pl_eqt: optionalNumber,
  /** Distance in parsecs */
  sy_dist: optionalNumber,
  discoverymethod: optionalString,
  disc_year: optionalNumber,
  disc_locale: optionalString,
  disc_facility: optionalString,
  disc_telescope: optionalString,
  disc_instrument: optionalString,
  disc_refname: optionalString,
  disc_pubdate: optionalString,
}).passthrough();

export type PlanetRecord = z.infer<typeof planetRecordSchema>;

/**
 * Columns a calculation may require to be present.
 */
export type NumericColumn = 'pl_masse' | 'pl_rade' | 'pl_orbper' | 'pl_orbsmax' | 'pl_eqt' | 'sy_dist' | 'disc_year';

/**
 * Validate raw TAP rows as planet records.
 *
 * @throws ServiceError (malformed_response) when a row has no pl_name or a column of the wrong type
 */
export function toPlanetRecords(rows: readonly TapRow[]): PlanetRecord[] {
  return rows.map((row, index) => {
    const parsed = planetRecordSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ServiceError(
        'malformed_response',
        `Row ${index} is not a planet record: ${issue.path.join('.')} ${issue.message}`
      );
    }
    return parsed.data;
  });
}

/**
 * Read a numeric column, treating null, undefined and NaN alike as missing.
 */
export function numericValue(record: PlanetRecord, column: NumericColumn): number | null {
  const value = record[column];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
