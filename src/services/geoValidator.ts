/**
 * Geofence checks for check-in requests.
 *
 * Every check is fail-closed: a missing, malformed or low-quality GPS fix is a
 * failed check, never a pass.
 */

import { isValidCoordinate, toRad } from 'geolib';
import { ClaimedFix, GeoPoint, GeofenceRejection } from '../types/attendance';

// Same radius geolib.getDistance uses, so both agree to the metre
export const EARTH_RADIUS_METERS = 6378137;

export interface GeofenceMeasurement {
  within: boolean;
  distanceMeters: number | null;
  reason: GeofenceRejection | null;
}

export interface GeofenceOptions {
  accuracyMeters?: number | null;
  maxAccuracyMeters?: number;
}

/**
 * Great-circle distance in meters (haversine), unrounded. Geofence decisions
 * compare against this value.
 */
export const greatCircleDistance = (from: GeoPoint, to: GeoPoint): number => {
  const dLat = toRad(to.latitude) - toRad(from.latitude);
  const dLng = toRad(to.longitude) - toRad(from.longitude);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(from.latitude)) * Math.cos(toRad(to.latitude)) * Math.sin(dLng / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * c;
};

const toCentimetres = (meters: number): number => Math.round(meters * 100) / 100;

// Rounded to centimetres, for reporting
export const haversineDistance = (from: GeoPoint, to: GeoPoint): number =>
  toCentimetres(greatCircleDistance(from, to));

/**
 * A fix is usable when both values are finite, in range and not (0,0),
 * which browsers and devices report when no real fix is available.
 */
export const isUsableFix = (fix: ClaimedFix | null | undefined): fix is GeoPoint => {
  if (!fix) return false;
  const { latitude, longitude } = fix;
  if (typeof latitude !== 'number' || typeof longitude !== 'number') return false;
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return false;
  if (latitude === 0 && longitude === 0) return false;
  return isValidCoordinate({ latitude, longitude });
};

export const measureGeofence = (
  origin: GeoPoint,
  claimed: ClaimedFix | null | undefined,
  radiusMeters: number,
  options: GeofenceOptions = {}
): GeofenceMeasurement => {
  if (!Number.isFinite(radiusMeters) || radiusMeters <= 0) {
    return { within: false, distanceMeters: null, reason: 'INVALID_RADIUS' };
  }

  if (!isUsableFix(claimed)) {
    return { within: false, distanceMeters: null, reason: 'INVALID_FIX' };
  }

  const { accuracyMeters, maxAccuracyMeters } = options;
  if (accuracyMeters !== undefined && accuracyMeters !== null) {
    if (!Number.isFinite(accuracyMeters) || accuracyMeters <= 0) {
      return { within: false, distanceMeters: null, reason: 'INVALID_FIX' };
    }
    if (maxAccuracyMeters !== undefined && accuracyMeters > maxAccuracyMeters) {
      return { within: false, distanceMeters: null, reason: 'LOW_ACCURACY' };
    }
  }

  const distance = greatCircleDistance(origin, claimed);
  const within = distance <= radiusMeters;

  return { within, distanceMeters: toCentimetres(distance), reason: within ? null : 'OUTSIDE_RADIUS' };
};

export const withinGeofence = (
  origin: GeoPoint,
  claimed: ClaimedFix | null | undefined,
  radiusMeters: number
): boolean => measureGeofence(origin, claimed, radiusMeters).within;
