/**
 * Per-record evaluation
 *
 * A calculator that lacks data for one planet fails that planet only; the
 * rest of the batch still computes.
 */

import { MissingDataError, type ErrorCode } from '../errors.js';
import type { PlanetRecord } from '../archive/planet-record.js';

export interface RecordFailure {
  pl_name: string;
  errorType: ErrorCode;
  message: string;
}

export interface BatchResult<T> {
  data: T[];
  failures: RecordFailure[];
}

/**
 * Apply `compute` to each record. MissingDataError becomes a failure entry for
 * that record; any other error propagates and fails the whole call.
 */
export function evaluateEach<T>(
  records: readonly PlanetRecord[],
  compute: (record: PlanetRecord) => T
): BatchResult<T> {
  const data: T[] = [];
  const failures: RecordFailure[] = [];

  for (const record of records) {
    try {
      data.push(compute(record));
    } catch (error) {
      if (!(error instanceof MissingDataError)) throw error;
      failures.push({ pl_name: record.pl_name, errorType: error.code, message: error.message });
    }
  }

  return { data, failures };
}

/**
 * Failures for requested names the archive returned no row for.
 */
export function notFoundFailures(requested: readonly string[], records: readonly PlanetRecord[]): RecordFailure[] {
  const found = new Set(records.map(record => record.pl_name));
  return requested
    .filter(name => !found.has(name))
    .map(name => ({
      pl_name: name,
      errorType: 'not_found' as const,
      message: `No planet named '${name}' in the archive`,
    }));
}
