/**
 * Angle unit conversions. Every helper is total and pure.
 */

export const DEG_TO_RAD = Math.PI / 180;
export const RAD_TO_DEG = 180 / Math.PI;

/** Degrees per hour of right ascension (360 / 24) */
export const DEGREES_PER_HOUR = 15;

export function radians(deg: number): number {
  return DEG_TO_RAD * deg;
}

export function degrees(rad: number): number {
  return RAD_TO_DEG * rad;
}

export function arcsec2degrees(angle: number): number {
  return angle / 3600;
}

export function arcmin2degrees(angle: number): number {
  return angle / 60;
}

export function arcsec2radians(angle: number): number {
  return radians(arcsec2degrees(angle));
}

export function arcmin2radians(angle: number): number {
  return radians(arcmin2degrees(angle));
}

/**
 * Fold an angle in degrees into (-180, 180].
 * Useful when comparing longitudes that may differ by a full turn.
 */
export function wrapDegrees180(deg: number): number {
  const wrapped = ((deg % 360) + 360) % 360;
  return wrapped > 180 ? wrapped - 360 : wrapped;
}
