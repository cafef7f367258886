/**
 * Core type definitions for the sky-coordinates library
 */

// =============================================================================
// ALGEBRA TYPES
// =============================================================================

/** Dense real vector (immutable) */
export type Vector = readonly number[];

/** Dense row-major matrix: every row has the same length */
export type Matrix = readonly Vector[];

/** Cartesian point or spherical triple */
export type Vector3 = readonly [number, number, number];

/** Fixed-size 3x3 matrix used on the rotation path */
export type Matrix3 = readonly [Vector3, Vector3, Vector3];

/** Spherical triple in the order [r, phi, theta] */
export type SphericalVector = Vector3;

/** Axis of an elementary rotation */
export type Axis = "x" | "y" | "z";

// =============================================================================
// FRAME TYPES
// =============================================================================

/** Reference frames the library can convert between */
export type Frame = "galactic" | "icrs" | "ecliptic";

/** The six supported frame changes */
export type TransformationName =
  | "GAL2ICRS" // galactic -> ICRS
  | "ICRS2GAL" // ICRS -> galactic
  | "ECL2ICRS" // ecliptic -> ICRS
  | "ICRS2ECL" // ICRS -> ecliptic
  | "GAL2ECL" // galactic -> ecliptic
  | "ECL2GAL"; // ecliptic -> galactic

/** Endpoints of a transformation */
export interface FrameChange {
  readonly from: Frame;
  readonly to: Frame;
}

/** Longitude-like and latitude-like pair produced by a transformation */
export interface SkyPosition {
  readonly lon: number;
  readonly lat: number;
}

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface CoordinateOptions {
  /** Take inputs in degrees and report outputs in degrees */
  useDegrees: boolean;
  /** Separator between sexagesimal fields */
  delimiter: string;
  /** Minimum level written by the library loggers */
  logLevel: LogLevel;
}
