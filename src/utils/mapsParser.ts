import axios from 'axios';
import { GeoPoint } from '../types/attendance';

/**
 * Google Maps link parser for session locations.
 *
 * Instructors may anchor a session with a pasted Maps link instead of raw
 * coordinates. Supported forms:
 * - https://maps.google.com/?q=lat,lng
 * - https://www.google.com/maps/place/.../@lat,lng,zoom
 * - https://maps.google.com/maps?ll=lat,lng
 * - https://maps.app.goo.gl/... and https://goo.gl/maps/... (redirect is followed)
 *
 * Returns null when no coordinate pair can be extracted.
 */

const SHORT_LINK = /^(https?:\/\/)?(maps\.app\.goo\.gl|goo\.gl\/maps)\//;
const REDIRECT_TIMEOUT_MS = 10000;

const COORDINATE_PATTERNS: RegExp[] = [
  /[?&]q=([+-]?\d+\.?\d*),\s*([+-]?\d+\.?\d*)/,
  /[?&]ll=([+-]?\d+\.?\d*),\s*([+-]?\d+\.?\d*)/,
  /@([+-]?\d+\.?\d*),([+-]?\d+\.?\d*)/,
  /([+-]?\d+\.\d+),\s*([+-]?\d+\.\d+)/,
];

const toPoint = (latRaw: string, lngRaw: string): GeoPoint | null => {
  const latitude = parseFloat(latRaw);
  const longitude = parseFloat(lngRaw);
  if (isNaN(latitude) || isNaN(longitude)) return null;
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) return null;
  return { latitude, longitude };
};

export const parseCoordinatesFromUrl = (url: string): GeoPoint | null => {
  for (const pattern of COORDINATE_PATTERNS) {
    const match = url.match(pattern);
    if (match && match[1] && match[2]) {
      const point = toPoint(match[1], match[2]);
      if (point) return point;
    }
  }
  return null;
};

// Node's http adapter exposes the final URL after redirects on request.res.responseUrl
const readResponseUrl = (request: unknown): string | null => {
  if (typeof request !== 'object' || request === null || !('res' in request)) return null;
  const res = request.res;
  if (typeof res !== 'object' || res === null || !('responseUrl' in res)) return null;
  return typeof res.responseUrl === 'string' ? res.responseUrl : null;
};

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

const followShortLink = async (url: string): Promise<string> => {
  const response = await axios.get(url, {
    maxRedirects: 5,
    timeout: REDIRECT_TIMEOUT_MS,
    validateStatus: (status) => status < 400,
    responseType: 'text',
  });
  return readResponseUrl(response.request) ?? url;
};

export const extractCoordinatesFromGoogleMapsLink = async (url: unknown): Promise<GeoPoint | null> => {
  if (!url || typeof url !== 'string') {
    return null;
  }

  let target = url.trim();

  if (SHORT_LINK.test(target)) {
    try {
      target = await followShortLink(target);
    } catch (err) {
      // Fall through and try the original URL
      console.warn('[MAPS_PARSER] Failed to follow redirect for Google Maps link:', {
        url: target,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return parseCoordinatesFromUrl(safeDecode(target));
};
