/**
 * Coordinate validation and path rendering
 */

import { z } from 'zod';
import { InvalidRequestError } from '../core/errors.js';

/**
 * WGS84 coordinate schema
 *
 * Rejects out-of-range values and special floats (NaN, Infinity).
 */
export const CoordinateSchema = z.object({
  lat: z
    .number()
    .finite('Latitude must be a finite number')
    .min(-90, 'Latitude must be between -90 and 90')
    .max(90, 'Latitude must be between -90 and 90'),
  lon: z
    .number()
    .finite('Longitude must be a finite number')
    .min(-180, 'Longitude must be between -180 and 180')
    .max(180, 'Longitude must be between -180 and 180'),
});

export type Coordinates = z.infer<typeof CoordinateSchema>;

/**
 * @throws {InvalidRequestError} when either value is out of range
 */
export function validateCoordinates(lat: number, lon: number): Coordinates {
  const result = CoordinateSchema.safeParse({ lat, lon });
  if (!result.success) {
    throw new InvalidRequestError(result.error.issues[0]?.message ?? 'Invalid coordinates');
  }
  return result.data;
}

/**
 * Fixed six-decimal rendering used in every path segment.
 * `toFixed` never switches to exponent notation below 1e21.
 */
export function formatCoordinate(value: number): string {
  if (!Number.isFinite(value)) {
    throw new InvalidRequestError(`Coordinate must be a finite number, got ${value}`);
  }
  return value.toFixed(6);
}

/**
 * `{lat},{lon}` path segment
 */
export function formatLatLon(lat: number, lon: number): string {
  const coords = validateCoordinates(lat, lon);
  return `${formatCoordinate(coords.lat)},${formatCoordinate(coords.lon)}`;
}
