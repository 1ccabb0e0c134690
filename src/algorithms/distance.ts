import { Location } from '../types';

export const EARTH_RADIUS_KM = 6371;

function toRad(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Great-circle distance in km between two points, spherical law of cosines.
 * The cosine term can drift just outside [-1, 1] for coincident points, so it
 * is clamped before acos.
 * Time Complexity: O(1)
 */
export function greatCircleDistance(from: Location, to: Location): number {
  if (from.latitude === to.latitude && from.longitude === to.longitude) {
    return 0;
  }

  const cosine =
    Math.cos(toRad(from.latitude)) *
      Math.cos(toRad(to.latitude)) *
      Math.cos(toRad(to.longitude) - toRad(from.longitude)) +
    Math.sin(toRad(from.latitude)) * Math.sin(toRad(to.latitude));

  return EARTH_RADIUS_KM * Math.acos(Math.min(1, Math.max(-1, cosine)));
}

/**
 * Distance from a query point to a ride's pickup point.
 */
export function distanceToPickup(
  origin: Location,
  ride: { pickupLatitude: number; pickupLongitude: number }
): number {
  return greatCircleDistance(origin, {
    latitude: ride.pickupLatitude,
    longitude: ride.pickupLongitude
  });
}

/**
 * Parse a query-string coordinate. Returns null for anything that is not a
 * finite number; callers treat null as "no geolocation".
 */
export function parseCoordinate(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw !== 'string' || raw.trim() === '') {
    return null;
  }
  const value = Number(raw.trim());
  return Number.isFinite(value) ? value : null;
}

/**
 * Build a query origin from raw latitude/longitude, or null when either is
 * missing, unparsable or outside the WGS84 range.
 */
export function parseOrigin(rawLatitude: unknown, rawLongitude: unknown): Location | null {
  const latitude = parseCoordinate(rawLatitude);
  const longitude = parseCoordinate(rawLongitude);

  if (latitude === null || longitude === null) {
    return null;
  }
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    return null;
  }
  return { latitude, longitude };
}
