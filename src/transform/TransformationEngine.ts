import { createCoordinateOptions } from "@/config/coordinatesConfig";
import { createLogger, type Logger } from "@/core/logger";
import { UnknownTransformationError } from "@/errors";
import { degrees, radians } from "@/math/Angle";
import { dot } from "@/math/LinearAlgebra";
import { ROTATION_MATRICES } from "@/math/RotationMatrix";
import { cartesianToSpherical, sphericalToCartesian } from "@/math/Spherical";
import type {
  CoordinateOptions,
  Frame,
  FrameChange,
  Matrix3,
  SkyPosition,
  TransformationName,
} from "@/types";

/**
 * TransformationEngine - frame changes between galactic, ICRS and ecliptic
 *
 *  +----------+----------+----------+
 *  |  name    |   from   |    to    |
 *  +----------+----------+----------+
 *  | GAL2ICRS | galactic | ICRS     |
 *  | ICRS2GAL | ICRS     | galactic |
 *  | ECL2ICRS | ecliptic | ICRS     |
 *  | ICRS2ECL | ICRS     | ecliptic |
 *  | GAL2ECL  | galactic | ecliptic |
 *  | ECL2GAL  | ecliptic | galactic |
 *  +----------+----------+----------+
 */

export const TRANSFORMATION_FRAMES: Readonly<Record<TransformationName, FrameChange>> = {
  GAL2ICRS: { from: "galactic", to: "icrs" },
  ICRS2GAL: { from: "icrs", to: "galactic" },
  ECL2ICRS: { from: "ecliptic", to: "icrs" },
  ICRS2ECL: { from: "icrs", to: "ecliptic" },
  GAL2ECL: { from: "galactic", to: "ecliptic" },
  ECL2GAL: { from: "ecliptic", to: "galactic" },
};

export const TRANSFORMATION_NAMES: readonly TransformationName[] = [
  "GAL2ICRS",
  "ICRS2GAL",
  "ECL2ICRS",
  "ICRS2ECL",
  "GAL2ECL",
  "ECL2GAL",
];

const INVERSES: Readonly<Record<TransformationName, TransformationName>> = {
  GAL2ICRS: "ICRS2GAL",
  ICRS2GAL: "GAL2ICRS",
  ECL2ICRS: "ICRS2ECL",
  ICRS2ECL: "ECL2ICRS",
  GAL2ECL: "ECL2GAL",
  ECL2GAL: "GAL2ECL",
};

function isTransformationName(value: string): value is TransformationName {
  return TRANSFORMATION_NAMES.some((name) => name === value);
}

/**
 * Resolve a transformation name, ignoring case.
 *
 * @throws UnknownTransformationError for anything outside the six names
 */
export function parseTransformationName(text: string): TransformationName {
  const upper = text.toUpperCase();
  if (isTransformationName(upper)) return upper;
  throw new UnknownTransformationError("Cannot find this transformation name", text);
}

/**
 * Rotation matrix for a named transformation
 */
export function getRotationMatrix(name: string): Matrix3 {
  return ROTATION_MATRICES[parseTransformationName(name)];
}

/**
 * The transformation that undoes `name`
 */
export function inverseTransformation(name: string): TransformationName {
  return INVERSES[parseTransformationName(name)];
}

/**
 * Named transformation from one frame to another.
 *
 * @throws UnknownTransformationError when both frames are the same
 */
export function transformationBetween(from: Frame, to: Frame): TransformationName {
  const name = TRANSFORMATION_NAMES.find(
    (candidate) =>
      TRANSFORMATION_FRAMES[candidate].from === from && TRANSFORMATION_FRAMES[candidate].to === to
  );
  if (name) return name;
  throw new UnknownTransformationError("No transformation between frames", `${from} -> ${to}`);
}

function rotate(matrix: Matrix3, lon: number, lat: number): SkyPosition {
  const xyz = sphericalToCartesian(1, lon, lat);
  const [x, y, z] = dot(matrix, xyz);
  const [, phi, theta] = cartesianToSpherical(x, y, z);
  return { lon: phi, lat: theta };
}

function applyWithLogger(
  name: string,
  lon: number,
  lat: number,
  useDegrees: boolean,
  logger?: Logger
): SkyPosition {
  const resolved = parseTransformationName(name);
  const matrix = ROTATION_MATRICES[resolved];

  let result: SkyPosition;
  if (useDegrees) {
    const rotated = rotate(matrix, radians(lon), radians(lat));
    result = { lon: degrees(rotated.lon), lat: degrees(rotated.lat) };
  } else {
    result = rotate(matrix, lon, lat);
  }

  logger?.debug(
    `${resolved} (${lon}, ${lat}) -> (${result.lon}, ${result.lat}) ${useDegrees ? "deg" : "rad"}`
  );
  return result;
}

/**
 * Apply a named transformation to a point on the unit sphere.
 *
 * @param name - One of the six transformation names (any case)
 * @param lon - Longitude-like input coordinate
 * @param lat - Latitude-like input coordinate
 * @param useDegrees - Inputs and outputs in degrees (default: true), otherwise radians
 * @returns Transformed coordinates; lon in (-180, 180] degrees or (-pi, pi] radians
 * @throws UnknownTransformationError for an unknown name
 */
export function applyTransformation(
  name: string,
  lon: number,
  lat: number,
  useDegrees: boolean = true
): SkyPosition {
  return applyWithLogger(name, lon, lat, useDegrees);
}

export interface Transformer {
  readonly useDegrees: boolean;
  apply(name: string, lon: number, lat: number): SkyPosition;
  convert(from: Frame, to: Frame, lon: number, lat: number): SkyPosition;
}

/**
 * Creates a transformer bound to a unit convention and logger
 */
export function createTransformer(options: Partial<CoordinateOptions> = {}): Transformer {
  const { useDegrees, logLevel } = createCoordinateOptions(options);
  const logger = createLogger("TransformationEngine", logLevel);

  return {
    useDegrees,
    apply: (name, lon, lat) => applyWithLogger(name, lon, lat, useDegrees, logger),
    convert: (from, to, lon, lat) =>
      applyWithLogger(transformationBetween(from, to), lon, lat, useDegrees, logger),
  };
}
