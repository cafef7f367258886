import { DomainError } from "@/errors";
import type { SphericalVector, Vector3 } from "@/types";
import { degrees, radians } from "./Angle";

/**
 * Spherical <-> Cartesian conversion and great-circle distance.
 *
 * Angles follow the astronomical convention: theta is an elevation
 * (declination, latitude) measured from the equator, not a colatitude.
 */

/**
 * Convert spherical coordinates to Cartesian ones.
 *
 * @param r - Length of the vector
 * @param phi - Longitude-like angle (right ascension, ecliptic longitude) in radians
 * @param theta - Latitude-like angle (declination, ecliptic latitude) in radians
 * @returns [x, y, z]
 */
export function sphericalToCartesian(r: number, phi: number, theta: number): Vector3 {
  const cosTheta = Math.cos(theta);
  return [r * Math.cos(phi) * cosTheta, r * Math.sin(phi) * cosTheta, r * Math.sin(theta)];
}

/**
 * Convert Cartesian coordinates to spherical ones.
 *
 * @returns [r, phi, theta] with phi in (-pi, pi] and theta in [-pi/2, pi/2]
 * @throws DomainError when the point is at the origin
 */
export function cartesianToSpherical(x: number, y: number, z: number): SphericalVector {
  const rCylSq = x * x + y * y;
  const r = Math.sqrt(rCylSq + z * z);
  if (r === 0) {
    throw new DomainError("Point is at distance zero, direction is undefined");
  }
  // atan2(-0, x < 0) is -pi; keep phi in (-pi, pi]
  const phi = Math.atan2(y, x);
  return [r, phi === -Math.PI ? Math.PI : phi, Math.atan2(z, Math.sqrt(rCylSq))];
}

/**
 * Angular distance between two points on the sphere (haversine form).
 * All arguments and the result are in radians; result is in [0, pi].
 */
export function sphericalDistanceRadians(
  lon1: number,
  lat1: number,
  lon2: number,
  lat2: number
): number {
  const sinHalfLat = Math.sin((lat1 - lat2) / 2);
  const sinHalfLon = Math.sin((lon1 - lon2) / 2);
  const h = sinHalfLat * sinHalfLat + Math.cos(lat1) * Math.cos(lat2) * sinHalfLon * sinHalfLon;
  // Rounding can push h a hair above 1 for antipodal points
  return 2 * Math.asin(Math.sqrt(Math.min(1, h)));
}

/**
 * Angular distance in degrees between two points given in degrees.
 */
export function sphericalDistanceDegrees(
  lon1: number,
  lat1: number,
  lon2: number,
  lat2: number
): number {
  return degrees(
    sphericalDistanceRadians(radians(lon1), radians(lat1), radians(lon2), radians(lat2))
  );
}
