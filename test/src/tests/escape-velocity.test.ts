/**
 * Unit tests for escape velocity and surface gravity
 */

import {
  computeEscapeVelocity,
  escapeVelocityKms,
  surfaceGravity,
  velocityBand,
} from '../../../src/metrics/escape-velocity.js';
import { toPlanetRecords } from '../../../src/archive/planet-record.js';
import { MissingDataError } from '../../../src/errors.js';
import { HOT_GIANT, KEPLER_442B, NO_MASS } from '../helpers/test-setup.js';

describe('ESCAPE VELOCITY', () => {
  describe('Kepler-442 b (2.36 Earth masses, 1.34 Earth radii)', () => {
    const [record] = toPlanetRecords([KEPLER_442B]);
    const metrics = computeEscapeVelocity(record);

    it('computes velocity and ratio against Earth', () => {
      expect(metrics.escapeVelocityKms).toBe(14.84);
      expect(metrics.earthEscapeVelocityKms).toBe(11.2);
      expect(metrics.ratioVsEarth).toBe(1.33);
    });

    it('labels it hard to escape', () => {
      expect(metrics.difficulty).toBe('Difícil de escapar');
      expect(metrics.interpretation).toBe('Alta - gravedad superficial significativa; Un cohete tipo Saturn V podría escapar');
    });

    it('reports surface gravity', () => {
      expect(metrics.surfaceGravityMs2).toBe(12.91);
      expect(metrics.gravityVsEarth).toBe(1.31);
    });

    it('echoes the inputs', () => {
      expect(metrics.pl_name).toBe('Kepler-442 b');
      expect(metrics.pl_masse).toBe(2.36);
      expect(metrics.pl_rade).toBe(1.34);
    });
  });

  it('gives roughly 11.2 km/s and 9.8 m/s² for Earth', () => {
    expect(escapeVelocityKms(1, 1)).toBeCloseTo(11.19, 1);
    expect(surfaceGravity(1, 1)).toBeCloseTo(9.82, 1);
  });

  it('increases with mass at fixed radius', () => {
    const velocities = [0.5, 1, 2, 5, 10, 100].map(mass => escapeVelocityKms(mass, 1.5));
    for (let i = 1; i < velocities.length; i++) {
      expect(velocities[i]).toBeGreaterThan(velocities[i - 1]);
    }
  });

  it('decreases with radius at fixed mass', () => {
    const velocities = [0.5, 1, 2, 4, 10].map(radius => escapeVelocityKms(5, radius));
    for (let i = 1; i < velocities.length; i++) {
      expect(velocities[i]).toBeLessThan(velocities[i - 1]);
    }
  });

  it('uses exclusive upper bounds for difficulty bands', () => {
    expect(velocityBand(4.99).difficulty).toBe('Muy fácil de escapar');
    expect(velocityBand(5).difficulty).toBe('Moderadamente difícil');
    expect(velocityBand(29.9).difficulty).toBe('Difícil de escapar');
    expect(velocityBand(59.9).difficulty).toBe('Muy difícil de escapar');
    expect(velocityBand(60).difficulty).toBe('Extremadamente difícil de escapar');
  });

  it('notes that gas giants are beyond chemical rockets', () => {
    const [record] = toPlanetRecords([HOT_GIANT]);
    const metrics = computeEscapeVelocity(record);

    expect(metrics.escapeVelocityKms).toBe(58.42);
    expect(metrics.difficulty).toBe('Muy difícil de escapar');
    expect(metrics.interpretation).toBe('Muy alta - gigante gaseoso pequeño; Requeriría cohetes más potentes que los actuales');
  });

  describe('missing data', () => {
    it('fails a record without mass and names the column', () => {
      const [record] = toPlanetRecords([NO_MASS]);
      try {
        computeEscapeVelocity(record);
        throw new Error('expected a MissingDataError');
      } catch (error) {
        expect(error).toBeInstanceOf(MissingDataError);
        if (error instanceof MissingDataError) {
          expect(error.planet).toBe('Test-9 b');
          expect(error.columns).toEqual(['pl_masse']);
          expect(error.message).toBe("Planet 'Test-9 b' has no value for pl_masse");
        }
      }
    });

    it('lists both columns when mass and radius are missing', () => {
      expect(() => computeEscapeVelocity({ pl_name: 'Test-1 b' }))
        .toThrow("Planet 'Test-1 b' has no value for pl_masse, pl_rade");
    });

    it('treats a zero radius as missing', () => {
      expect(() => computeEscapeVelocity({ pl_name: 'Test-2 b', pl_masse: 1, pl_rade: 0 }))
        .toThrow("Planet 'Test-2 b' has no value for pl_rade");
    });
  });
});
