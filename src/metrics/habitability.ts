/**
 * Goldilocks screen
 *
 * A coarse habitability filter over equilibrium temperature, orbital period
 * and mass. It is an approximation for browsing the catalog, not a scientific
 * assessment: it ignores stellar type, atmosphere, eccentricity and whether
 * the mass is a minimum mass.
 */

import { MissingDataError } from '../errors.js';
import { numericValue, type NumericColumn, type PlanetRecord } from '../archive/planet-record.js';
import type { Predicate } from '../adql/query-builder.js';
import { round } from './constants.js';

export interface Bounds {
  /** Exclusive lower bound */
  min: number;
  /** Exclusive upper bound */
  max: number;
  unit: string;
}

export type HabitabilityCriterion = 'temperature' | 'orbitalPeriod' | 'mass';

export const GOLDILOCKS_BOUNDS: Readonly<Record<HabitabilityCriterion, Bounds>> = Object.freeze({
  // liquid water possible
  temperature: { min: 200, max: 320, unit: 'K' },
  orbitalPeriod: { min: 100, max: 500, unit: 'days' },
  // rules out gas giants and very small bodies
  mass: { min: 0.5, max: 10, unit: 'Earth masses' },
});

const CRITERION_COLUMNS: Readonly<Record<HabitabilityCriterion, NumericColumn>> = Object.freeze({
  temperature: 'pl_eqt',
  orbitalPeriod: 'pl_orbper',
  mass: 'pl_masse',
});

const CRITERIA: readonly HabitabilityCriterion[] = ['temperature', 'orbitalPeriod', 'mass'];

export interface HabitabilityAssessment {
  pl_name: string;
  pl_eqt: number;
  pl_orbper: number;
  pl_masse: number;
  criteria: Record<HabitabilityCriterion, boolean>;
  /** Fraction of criteria met, 0..1 */
  score: number;
  potentiallyHabitable: boolean;
}

export function withinBounds(value: number, bounds: Bounds): boolean {
  return value > bounds.min && value < bounds.max;
}

/**
 * ADQL predicates selecting the same rows the screen accepts.
 */
export function goldilocksPredicates(): Predicate[] {
  return CRITERIA.flatMap((criterion): Predicate[] => {
    const column = CRITERION_COLUMNS[criterion];
    const { min, max } = GOLDILOCKS_BOUNDS[criterion];
    return [
      { kind: 'notNull', column },
      { kind: 'range', column, min, max, exclusive: true },
    ];
  });
}

/**
 * @throws MissingDataError listing every criterion column the record lacks
 */
export function assessHabitability(record: PlanetRecord): HabitabilityAssessment {
  const temperature = numericValue(record, 'pl_eqt');
  const period = numericValue(record, 'pl_orbper');
  const mass = numericValue(record, 'pl_masse');

  if (temperature === null || period === null || mass === null) {
    const missing = CRITERIA
      .map(criterion => CRITERION_COLUMNS[criterion])
      .filter(column => numericValue(record, column) === null);
    throw new MissingDataError(record.pl_name, missing);
  }

  const criteria: Record<HabitabilityCriterion, boolean> = {
    temperature: withinBounds(temperature, GOLDILOCKS_BOUNDS.temperature),
    orbitalPeriod: withinBounds(period, GOLDILOCKS_BOUNDS.orbitalPeriod),
    mass: withinBounds(mass, GOLDILOCKS_BOUNDS.mass),
  };
  const met = CRITERIA.filter(criterion => criteria[criterion]).length;

  return {
    pl_name: record.pl_name,
    pl_eqt: temperature,
    pl_orbper: period,
    pl_masse: mass,
    criteria,
    score: round(met / CRITERIA.length),
    potentiallyHabitable: met === CRITERIA.length,
  };
}
