/**
 * Escape velocity and surface gravity
 *
 * v = sqrt(2GM / R), with M and R taken from the archive in Earth units.
 */

import { MissingDataError } from '../errors.js';
import { numericValue, type PlanetRecord } from '../archive/planet-record.js';
import {
  G,
  EARTH_MASS_KG,
  EARTH_RADIUS_M,
  EARTH_ESCAPE_VELOCITY_KMS,
  REFERENCE_ESCAPE_VELOCITIES_KMS,
  round,
} from './constants.js';

export interface EscapeVelocityMetrics {
  pl_name: string;
  pl_masse: number;
  pl_rade: number;
  escapeVelocityKms: number;
  earthEscapeVelocityKms: number;
  ratioVsEarth: number;
  difficulty: string;
  interpretation: string;
  surfaceGravityMs2: number;
  gravityVsEarth: number;
  reference: typeof REFERENCE_ESCAPE_VELOCITIES_KMS;
}

interface VelocityBand {
  /** Exclusive upper bound, km/s */
  below: number;
  difficulty: string;
  atmosphere: string;
}

// Ordered by upper bound; the last band catches everything else
const VELOCITY_BANDS: readonly VelocityBand[] = [
  { below: 5, difficulty: 'Muy fácil de escapar', atmosphere: 'Muy baja - atmósfera ligera o inexistente' },
  { below: 11, difficulty: 'Moderadamente difícil', atmosphere: 'Similar a la Tierra - puede retener atmósfera' },
  { below: 30, difficulty: 'Difícil de escapar', atmosphere: 'Alta - gravedad superficial significativa' },
  { below: 60, difficulty: 'Muy difícil de escapar', atmosphere: 'Muy alta - gigante gaseoso pequeño' },
  { below: Infinity, difficulty: 'Extremadamente difícil de escapar', atmosphere: 'Extremadamente alta - gigante gaseoso masivo' },
];

/** Below this a Saturn V class launcher would do */
const CHEMICAL_ROCKET_LIMIT_KMS = 20;

/**
 * Escape velocity in km/s for a body given in Earth masses and Earth radii.
 */
export function escapeVelocityKms(massEarths: number, radiusEarths: number): number {
  const massKg = massEarths * EARTH_MASS_KG;
  const radiusM = radiusEarths * EARTH_RADIUS_M;
  return Math.sqrt((2 * G * massKg) / radiusM) / 1000;
}

/**
 * Surface gravity in m/s² for a body given in Earth masses and Earth radii.
 */
export function surfaceGravity(massEarths: number, radiusEarths: number): number {
  const radiusM = radiusEarths * EARTH_RADIUS_M;
  return (G * massEarths * EARTH_MASS_KG) / (radiusM * radiusM);
}

export function velocityBand(velocityKms: number): VelocityBand {
  return VELOCITY_BANDS.find(band => velocityKms < band.below) ?? VELOCITY_BANDS[VELOCITY_BANDS.length - 1];
}

/**
 * @throws MissingDataError when mass or radius is missing or not positive
 */
export function computeEscapeVelocity(record: PlanetRecord): EscapeVelocityMetrics {
  const mass = numericValue(record, 'pl_masse');
  const radius = numericValue(record, 'pl_rade');

  const missing: string[] = [];
  if (mass === null || mass <= 0) missing.push('pl_masse');
  if (radius === null || radius <= 0) missing.push('pl_rade');
  if (mass === null || radius === null || missing.length > 0) {
    throw new MissingDataError(record.pl_name, missing);
  }

  const velocity = escapeVelocityKms(mass, radius);
  const band = velocityBand(velocity);
  const rocket = velocity < CHEMICAL_ROCKET_LIMIT_KMS
    ? 'Un cohete tipo Saturn V podría escapar'
    : 'Requeriría cohetes más potentes que los actuales';

  return {
    pl_name: record.pl_name,
    pl_masse: mass,
    pl_rade: radius,
    escapeVelocityKms: round(velocity),
    earthEscapeVelocityKms: EARTH_ESCAPE_VELOCITY_KMS,
    ratioVsEarth: round(velocity / EARTH_ESCAPE_VELOCITY_KMS),
    difficulty: band.difficulty,
    interpretation: `${band.atmosphere}; ${rocket}`,
    surfaceGravityMs2: round(surfaceGravity(mass, radius)),
    gravityVsEarth: round(mass / (radius * radius)),
    reference: REFERENCE_ESCAPE_VELOCITIES_KMS,
  };
}
