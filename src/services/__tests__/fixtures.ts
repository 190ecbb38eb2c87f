import { jest } from '@jest/globals';
import { GeoPoint } from '../../types/attendance';
import { EARTH_RADIUS_METERS } from '../geoValidator';

export const CAMPUS: GeoPoint = { latitude: 28.6139, longitude: 77.209 };

export const SIGNING_SECRET = 'test-secret';

// A point `meters` due north; haversine gives back exactly `meters` for it
export const pointNorthOf = (origin: GeoPoint, meters: number): GeoPoint => ({
  latitude: origin.latitude + (meters / EARTH_RADIUS_METERS) * (180 / Math.PI),
  longitude: origin.longitude,
});

export const silenceConsole = () => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
};
