import { InvalidCoordinateError } from "../errors/index.js";
import { assertNonNegative } from "./math-utils.js";
import type { GeoPoint } from "../types/property.js";

export const EARTH_RADIUS_MILES = 3956;
const MILES_PER_DEGREE_LATITUDE = 69.0;

export interface BoundingBox {
  minLatitude: number;
  minLongitude: number;
  maxLatitude: number;
  maxLongitude: number;
}

export function isValidCoordinate(point: GeoPoint): boolean {
  const { latitude, longitude } = point;
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    latitude >= -90 &&
    latitude <= 90 &&
    longitude >= -180 &&
    longitude <= 180
  );
}

export function assertValidCoordinate(point: GeoPoint, recordId?: string): void {
  if (!Number.isFinite(point.latitude) || point.latitude < -90 || point.latitude > 90) {
    throw new InvalidCoordinateError("latitude", point.latitude, recordId);
  }
  if (!Number.isFinite(point.longitude) || point.longitude < -180 || point.longitude > 180) {
    throw new InvalidCoordinateError("longitude", point.longitude, recordId);
  }
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

// Great-circle distance (haversine) in miles
export function distanceMiles(a: GeoPoint, b: GeoPoint): number {
  assertValidCoordinate(a);
  assertValidCoordinate(b);

  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const dLat = lat2 - lat1;
  const dLon = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  // Rounding can push h a hair above 1 for antipodal points
  const c = 2 * Math.asin(Math.sqrt(Math.min(1, h)));

  return c * EARTH_RADIUS_MILES;
}

export function withinRadius(subject: GeoPoint, candidate: GeoPoint, radiusMiles: number): boolean {
  assertNonNegative(radiusMiles, "radiusMiles");
  return distanceMiles(subject, candidate) <= radiusMiles;
}

// Approximate lat/lon box around a point; a prefilter, not a distance test
export function boundingBox(center: GeoPoint, radiusMiles: number): BoundingBox {
  assertValidCoordinate(center);
  assertNonNegative(radiusMiles, "radiusMiles");

  const latDelta = radiusMiles / MILES_PER_DEGREE_LATITUDE;
  const milesPerLongitude = MILES_PER_DEGREE_LATITUDE * Math.cos(toRadians(center.latitude));
  // Near the poles a degree of longitude shrinks to nothing
  const lonDelta = milesPerLongitude > 1e-9 ? radiusMiles / milesPerLongitude : 180;

  return {
    minLatitude: Math.max(-90, center.latitude - latDelta),
    maxLatitude: Math.min(90, center.latitude + latDelta),
    minLongitude: center.longitude - lonDelta,
    maxLongitude: center.longitude + lonDelta,
  };
}

export function isInBoundingBox(point: GeoPoint, box: BoundingBox): boolean {
  if (point.latitude < box.minLatitude || point.latitude > box.maxLatitude) {
    return false;
  }
  if (box.maxLongitude - box.minLongitude >= 360) {
    return true;
  }

  // Shift the point into the box's longitude window to handle the antimeridian
  let longitude = point.longitude;
  while (longitude < box.minLongitude) {
    longitude += 360;
  }
  while (longitude > box.maxLongitude) {
    longitude -= 360;
  }
  return longitude >= box.minLongitude && longitude <= box.maxLongitude;
}
