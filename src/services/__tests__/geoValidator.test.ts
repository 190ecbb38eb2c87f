import { describe, test, expect } from '@jest/globals';
import { getDistance } from 'geolib';
import { greatCircleDistance, haversineDistance, isUsableFix, measureGeofence, withinGeofence } from '../geoValidator';
import { ClaimedFix } from '../../types/attendance';
import { CAMPUS, pointNorthOf } from './fixtures';

describe('haversineDistance', () => {
  test('distance from a point to itself is 0', () => {
    expect(haversineDistance(CAMPUS, CAMPUS)).toBe(0);
  });

  test('is symmetric', () => {
    const other = { latitude: 28.62, longitude: 77.2 };
    expect(haversineDistance(CAMPUS, other)).toBe(haversineDistance(other, CAMPUS));
  });

  test('measures a northward offset in meters', () => {
    expect(haversineDistance(CAMPUS, pointNorthOf(CAMPUS, 100))).toBe(100);
    expect(haversineDistance(CAMPUS, pointNorthOf(CAMPUS, 250.5))).toBe(250.5);
  });

  test('agrees with geolib.getDistance to the metre', () => {
    const other = { latitude: 28.6251, longitude: 77.2301 };
    expect(Math.abs(haversineDistance(CAMPUS, other) - getDistance(CAMPUS, other))).toBeLessThanOrEqual(1);
  });
});

describe('isUsableFix', () => {
  test('accepts an in-range fix', () => {
    expect(isUsableFix({ latitude: 51.5, longitude: -0.12 })).toBe(true);
  });

  test.each<[string, ClaimedFix]>([
    ['missing latitude', { latitude: null, longitude: 77.2 }],
    ['missing longitude', { latitude: 28.6, longitude: null }],
    ['null island', { latitude: 0, longitude: 0 }],
    ['NaN', { latitude: NaN, longitude: 77.2 }],
    ['infinite', { latitude: 28.6, longitude: Infinity }],
    ['latitude out of range', { latitude: 91, longitude: 10 }],
    ['longitude out of range', { latitude: 10, longitude: 181 }],
  ])('rejects %s', (_label, fix) => {
    expect(isUsableFix(fix)).toBe(false);
  });

  test('rejects a missing fix', () => {
    expect(isUsableFix(null)).toBe(false);
    expect(isUsableFix(undefined)).toBe(false);
  });
});

describe('measureGeofence', () => {
  test('a point exactly on the radius is inside', () => {
    const edge = pointNorthOf(CAMPUS, 100);
    const radius = greatCircleDistance(CAMPUS, edge);

    expect(measureGeofence(CAMPUS, edge, radius)).toEqual({
      within: true,
      distanceMeters: 100,
      reason: null,
    });
  });

  test('decides on the unrounded distance', () => {
    expect(measureGeofence(CAMPUS, pointNorthOf(CAMPUS, 100.004), 100)).toEqual({
      within: false,
      distanceMeters: 100,
      reason: 'OUTSIDE_RADIUS',
    });
  });

  test('a point just past the radius is outside', () => {
    expect(measureGeofence(CAMPUS, pointNorthOf(CAMPUS, 100.5), 100)).toEqual({
      within: false,
      distanceMeters: 100.5,
      reason: 'OUTSIDE_RADIUS',
    });
  });

  test('200 m away with a 100 m radius is outside, 99 m is inside', () => {
    expect(withinGeofence(CAMPUS, pointNorthOf(CAMPUS, 200), 100)).toBe(false);
    expect(withinGeofence(CAMPUS, pointNorthOf(CAMPUS, 99), 100)).toBe(true);
  });

  test('an unusable fix fails closed without a distance', () => {
    expect(measureGeofence(CAMPUS, { latitude: null, longitude: null }, 100)).toEqual({
      within: false,
      distanceMeters: null,
      reason: 'INVALID_FIX',
    });
    expect(measureGeofence(CAMPUS, { latitude: 0, longitude: 0 }, 20_000_000).reason).toBe('INVALID_FIX');
  });

  test.each([0, -10, NaN])('a radius of %p never matches', (radius) => {
    expect(measureGeofence(CAMPUS, CAMPUS, radius)).toEqual({
      within: false,
      distanceMeters: null,
      reason: 'INVALID_RADIUS',
    });
  });

  test('rejects a fix less accurate than the allowed maximum', () => {
    const near = pointNorthOf(CAMPUS, 10);
    expect(measureGeofence(CAMPUS, near, 100, { accuracyMeters: 150, maxAccuracyMeters: 100 }).reason).toBe(
      'LOW_ACCURACY'
    );
    expect(measureGeofence(CAMPUS, near, 100, { accuracyMeters: 0, maxAccuracyMeters: 100 }).reason).toBe(
      'INVALID_FIX'
    );
    expect(measureGeofence(CAMPUS, near, 100, { accuracyMeters: 25, maxAccuracyMeters: 100 })).toEqual({
      within: true,
      distanceMeters: 10,
      reason: null,
    });
  });

  test('accuracy is optional', () => {
    expect(measureGeofence(CAMPUS, pointNorthOf(CAMPUS, 10), 100, { maxAccuracyMeters: 100 }).within).toBe(true);
  });
});
