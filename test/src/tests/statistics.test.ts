/**
 * Unit tests for Earth comparison and discovery statistics
 */

import { classifyMass, compareWithEarth } from '../../../src/metrics/earth-comparison.js';
import { summarizeDiscoveryMethods, summarizeTimeline } from '../../../src/metrics/discovery-stats.js';
import { toPlanetRecords } from '../../../src/archive/planet-record.js';
import { ServiceError } from '../../../src/errors.js';
import { KEPLER_442B } from '../helpers/test-setup.js';

describe('EARTH COMPARISON', () => {
  it('expresses the orbit in Earth years and gravity and density relative to Earth', () => {
    const [record] = toPlanetRecords([KEPLER_442B]);

    expect(compareWithEarth(record)).toEqual({
      earthYears: 0.31,
      gravityVsEarth: 1.31,
      densityVsEarth: 0.98,
      interpretation: 'Mini-Neptuno',
    });
  });

  it('leaves fields null when their columns are missing', () => {
    expect(compareWithEarth({ pl_name: 'Test-6 b', pl_masse: 0.8 })).toEqual({
      earthYears: null,
      gravityVsEarth: null,
      densityVsEarth: null,
      interpretation: 'Masa similar a la Tierra (super-Tierra)',
    });
  });

  it.each([
    [0.3, 'Planeta muy ligero (posiblemente rocoso pequeño)'],
    [2.0, 'Masa similar a la Tierra (super-Tierra)'],
    [10, 'Mini-Neptuno'],
    [10.5, 'Gigante gaseoso'],
  ])('classifies %p Earth masses', (mass, expected) => {
    expect(classifyMass(mass)).toBe(expected);
  });
});

describe('DISCOVERY STATISTICS', () => {
  it('computes each method share of the total', () => {
    const shares = summarizeDiscoveryMethods([
      { discoverymethod: 'Radial Velocity', discoveries: 1 },
      { discoverymethod: 'Transit', discoveries: 3 },
    ]);

    expect(shares).toEqual([
      { discoverymethod: 'Transit', discoveries: 3, percentage: 75 },
      { discoverymethod: 'Radial Velocity', discoveries: 1, percentage: 25 },
    ]);
  });

  it('rounds shares to two decimals and orders ties by name', () => {
    const shares = summarizeDiscoveryMethods([
      { discoverymethod: 'Transit', discoveries: 1 },
      { discoverymethod: 'Imaging', discoveries: 1 },
      { discoverymethod: 'Astrometry', discoveries: 1 },
    ]);

    expect(shares.map(share => share.discoverymethod)).toEqual(['Astrometry', 'Imaging', 'Transit']);
    expect(shares.map(share => share.percentage)).toEqual([33.33, 33.33, 33.33]);
  });

  it('reports zero shares when nothing was counted', () => {
    expect(summarizeDiscoveryMethods([{ discoverymethod: 'Imaging', discoveries: 0 }]))
      .toEqual([{ discoverymethod: 'Imaging', discoveries: 0, percentage: 0 }]);
  });

  it('rejects rows without a count', () => {
    expect(() => summarizeDiscoveryMethods([{ discoverymethod: 'Transit' }])).toThrow(ServiceError);
  });

  it('sorts years and keeps a running total', () => {
    const years = summarizeTimeline([
      { disc_year: 2016, discoveries: 5, methods: 2, facilities: 3 },
      { disc_year: 2014, discoveries: 2, methods: 1, facilities: 1 },
      { disc_year: 2015, discoveries: 3, methods: 2, facilities: 2 },
    ]);

    expect(years.map(year => [year.disc_year, year.cumulative])).toEqual([[2014, 2], [2015, 5], [2016, 10]]);
    expect(years[2]).toEqual({ disc_year: 2016, discoveries: 5, methods: 2, facilities: 3, cumulative: 10 });
  });
});
