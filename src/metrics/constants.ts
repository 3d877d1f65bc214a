/**
 * Physical constants (SI units unless stated otherwise)
 */

/** Gravitational constant, m³/(kg·s²) */
export const G = 6.674e-11;

export const EARTH_MASS_KG = 5.972e24;

export const EARTH_RADIUS_M = 6.371e6;

/** Reference escape velocity of Earth, km/s */
export const EARTH_ESCAPE_VELOCITY_KMS = 11.2;

export const EARTH_ORBITAL_PERIOD_DAYS = 365.25;

/** Escape velocities of familiar bodies, km/s */
export const REFERENCE_ESCAPE_VELOCITIES_KMS = Object.freeze({
  luna: 2.4,
  marte: 5.0,
  tierra: 11.2,
  jupiter: 59.5,
  sol: 617.5,
});

export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
