import { UnknownTransformationError } from "@/errors";
import type { Axis, Matrix3, TransformationName } from "@/types";

/**
 * Fixed rotations between the galactic, ICRS and ecliptic frames.
 *
 * Derived offline (Hipparcos Explanatory Supplement vol. 1, section 1.5;
 * Murray 1983, section 10.2) from J2000 values:
 * - north galactic pole at RA 192.85948 deg, Dec 27.12825 deg
 * - longitude of the ascending node of the galactic plane, 32.93192 deg
 * - obliquity of the ecliptic, 23 deg 26' 21.448"
 *
 *   ICRS2GAL = Rz(-32.93192) * Rx(90 - 27.12825) * Rz(192.85948 + 90)
 *   ICRS2ECL = Rx(obliquity)
 *   GAL2ECL  = ICRS2ECL * GAL2ICRS
 *
 * Each inverse is the transpose. The values are not recomputed at runtime.
 */

function freeze3(rows: Matrix3): Matrix3 {
  rows.forEach((row) => Object.freeze(row));
  return Object.freeze(rows);
}

export const ICRS_TO_GALACTIC: Matrix3 = freeze3([
  [-0.05487556041621569, -0.873437090234885, -0.48383501554871317],
  [0.4941094278755837, -0.44482962996001124, 0.746982244497219],
  [-0.8676661490190047, -0.19807637343120127, 0.4559837761750671],
]);

export const GALACTIC_TO_ICRS: Matrix3 = freeze3([
  [-0.05487556041621569, 0.4941094278755837, -0.8676661490190047],
  [-0.873437090234885, -0.44482962996001124, -0.19807637343120127],
  [-0.48383501554871317, 0.746982244497219, 0.4559837761750671],
]);

export const ICRS_TO_ECLIPTIC: Matrix3 = freeze3([
  [1, 0, 0],
  [0, 0.9174820620691818, 0.39777715593191365],
  [0, -0.39777715593191365, 0.9174820620691818],
]);

export const ECLIPTIC_TO_ICRS: Matrix3 = freeze3([
  [1, 0, 0],
  [0, 0.9174820620691818, -0.39777715593191365],
  [0, 0.39777715593191365, 0.9174820620691818],
]);

export const GALACTIC_TO_ECLIPTIC: Matrix3 = freeze3([
  [-0.05487556041621569, 0.4941094278755837, -0.8676661490190047],
  [-0.9938213790616487, -0.11099073341744109, -0.000351589904831362],
  [-0.0964766261278292, 0.862285875090113, 0.4971471917159637],
]);

export const ECLIPTIC_TO_GALACTIC: Matrix3 = freeze3([
  [-0.05487556041621569, -0.9938213790616487, -0.0964766261278292],
  [0.4941094278755837, -0.11099073341744109, 0.862285875090113],
  [-0.8676661490190047, -0.000351589904831362, 0.4971471917159637],
]);

/** Obliquity of the ecliptic at J2000, in radians */
export const OBLIQUITY_J2000 = ((23 + 26 / 60 + 21.448 / 3600) * Math.PI) / 180;

export const ROTATION_MATRICES: Readonly<Record<TransformationName, Matrix3>> = Object.freeze({
  GAL2ICRS: GALACTIC_TO_ICRS,
  ICRS2GAL: ICRS_TO_GALACTIC,
  ECL2ICRS: ECLIPTIC_TO_ICRS,
  ICRS2ECL: ICRS_TO_ECLIPTIC,
  GAL2ECL: GALACTIC_TO_ECLIPTIC,
  ECL2GAL: ECLIPTIC_TO_GALACTIC,
});

function parseAxis(axis: string): Axis {
  const lower = axis.toLowerCase();
  if (lower === "x" || lower === "y" || lower === "z") return lower;
  throw new UnknownTransformationError("Unknown rotation axis", axis);
}

/**
 * Rotation matrix for a rotation of `angle` radians about a coordinate axis.
 * The rotation is passive: it expresses fixed vectors in the rotated frame.
 *
 * @param axis - "x", "y" or "z" (either case)
 * @throws UnknownTransformationError for any other axis
 */
export function elementaryRotationMatrix(axis: string, angle: number): Matrix3 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);

  switch (parseAxis(axis)) {
    case "x":
      return [
        [1, 0, 0],
        [0, c, s],
        [0, -s, c],
      ];
    case "y":
      return [
        [c, 0, -s],
        [0, 1, 0],
        [s, 0, c],
      ];
    case "z":
      return [
        [c, s, 0],
        [-s, c, 0],
        [0, 0, 1],
      ];
  }
}
