/**
 * sky-coordinates
 *
 * Conversions between the galactic, ICRS and ecliptic frames, with the
 * angle parsing, spherical geometry and dense algebra they are built on.
 *
 * @example
 * ```typescript
 * import { applyTransformation, parseHmsToDegrees, parseDmsToDegrees } from "sky-coordinates";
 *
 * const ra = parseHmsToDegrees("17:45:40.04");
 * const dec = parseDmsToDegrees("-29:00:28.1");
 * const { lon, lat } = applyTransformation("ICRS2GAL", ra, dec);
 * ```
 */

// ===== Transformations =====
export {
  applyTransformation,
  createTransformer,
  getRotationMatrix,
  inverseTransformation,
  parseTransformationName,
  transformationBetween,
  TRANSFORMATION_FRAMES,
  TRANSFORMATION_NAMES,
} from "./transform/TransformationEngine";
export type { Transformer } from "./transform/TransformationEngine";

// ===== Rotation matrices =====
export {
  elementaryRotationMatrix,
  ROTATION_MATRICES,
  OBLIQUITY_J2000,
  GALACTIC_TO_ICRS,
  ICRS_TO_GALACTIC,
  ECLIPTIC_TO_ICRS,
  ICRS_TO_ECLIPTIC,
  GALACTIC_TO_ECLIPTIC,
  ECLIPTIC_TO_GALACTIC,
} from "./math/RotationMatrix";

// ===== Geometry =====
export {
  sphericalToCartesian,
  cartesianToSpherical,
  sphericalDistanceRadians,
  sphericalDistanceDegrees,
} from "./math/Spherical";

// ===== Algebra =====
export { dot, transpose } from "./math/LinearAlgebra";

// ===== Units =====
export {
  radians,
  degrees,
  arcsec2degrees,
  arcmin2degrees,
  arcsec2radians,
  arcmin2radians,
  wrapDegrees180,
  DEG_TO_RAD,
  RAD_TO_DEG,
  DEGREES_PER_HOUR,
} from "./math/Angle";

// ===== Parsing =====
export { parseDmsToDegrees, parseHmsToDegrees, createAngleParser } from "./parsing/AngleParser";
export type { AngleParser } from "./parsing/AngleParser";
export { splitString } from "./parsing/splitString";

// ===== Config & logging =====
export { DEFAULT_COORDINATE_OPTIONS, createCoordinateOptions } from "./config/coordinatesConfig";
export { createLogger } from "./core/logger";
export type { Logger } from "./core/logger";

// ===== Errors =====
export {
  CoordinatesError,
  DimensionError,
  FormatError,
  UnknownTransformationError,
  DomainError,
} from "./errors";

// ===== Types =====
export type {
  Vector,
  Matrix,
  Vector3,
  Matrix3,
  SphericalVector,
  Axis,
  Frame,
  FrameChange,
  TransformationName,
  SkyPosition,
  LogLevel,
  CoordinateOptions,
} from "./types";
