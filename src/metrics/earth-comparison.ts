import { numericValue, type PlanetRecord } from '../archive/planet-record.js';
import { EARTH_ORBITAL_PERIOD_DAYS, round } from './constants.js';

export interface EarthComparison {
  /** Orbital period in Earth years */
  earthYears: number | null;
  /** Surface gravity relative to Earth (M / R²) */
  gravityVsEarth: number | null;
  /** Bulk density relative to Earth (M / R³) */
  densityVsEarth: number | null;
  interpretation: string | null;
}

/**
 * Mass class by Earth masses; upper bounds are inclusive except the first.
 */
export function classifyMass(massEarths: number): string {
  if (massEarths < 0.5) return 'Planeta muy ligero (posiblemente rocoso pequeño)';
  if (massEarths <= 2.0) return 'Masa similar a la Tierra (super-Tierra)';
  if (massEarths <= 10.0) return 'Mini-Neptuno';
  return 'Gigante gaseoso';
}

/**
 * Missing columns leave the matching fields null instead of failing.
 */
export function compareWithEarth(record: PlanetRecord): EarthComparison {
  const period = numericValue(record, 'pl_orbper');
  const mass = numericValue(record, 'pl_masse');
  const radius = numericValue(record, 'pl_rade');

  return {
    earthYears: period === null ? null : round(period / EARTH_ORBITAL_PERIOD_DAYS),
    gravityVsEarth: mass === null || radius === null || radius <= 0 ? null : round(mass / radius ** 2),
    densityVsEarth: mass === null || radius === null || radius <= 0 ? null : round(mass / radius ** 3),
    interpretation: mass === null ? null : classifyMass(mass),
  };
}
