import { describe, expect, it } from 'vitest';

import { bearingDegrees, cardinalDirection, distanceMeters, formatDistance } from '../geo';

describe('distanceMeters', () => {
  it('measures one degree of longitude on the equator', () => {
    expect(distanceMeters({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(111_194.93, 1);
  });

  it('is zero for the same point', () => {
    const point = { latitude: 48.8566, longitude: 2.3522 };
    expect(distanceMeters(point, point)).toBe(0);
  });

  it('stays finite for antipodal points', () => {
    const distance = distanceMeters({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 180 });

    expect(Number.isNaN(distance)).toBe(false);
    expect(distance).toBeCloseTo(20_015_086.8, 1);
  });
});

describe('bearingDegrees', () => {
  it('points north and east', () => {
    expect(bearingDegrees({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 })).toBeCloseTo(0, 6);
    expect(bearingDegrees({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(90, 6);
    expect(bearingDegrees({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: -1 })).toBeCloseTo(270, 6);
  });
});

describe('cardinalDirection', () => {
  it('maps bearings to the nearest of eight directions', () => {
    expect(cardinalDirection(0)).toBe('N');
    expect(cardinalDirection(44)).toBe('NE');
    expect(cardinalDirection(180)).toBe('S');
    expect(cardinalDirection(337.5)).toBe('N');
    expect(cardinalDirection(-90)).toBe('W');
  });
});

describe('formatDistance', () => {
  it('rounds by magnitude', () => {
    expect(formatDistance(42.4)).toBe('42m');
    expect(formatDistance(449)).toBe('400m');
    expect(formatDistance(1234)).toBe('1.2km');
  });
});
