import type { CoordinateOptions } from "@/types";

/**
 * Default library options
 */
export const DEFAULT_COORDINATE_OPTIONS: CoordinateOptions = {
  useDegrees: true,
  delimiter: ":",
  /**
   * Library code stays quiet unless a caller opts in.
   * Set to "debug" to trace every transformation and rejected angle string.
   */
  logLevel: "silent",
};

/**
 * Creates a full option set, filling anything not given from the defaults
 */
export function createCoordinateOptions(
  options: Partial<CoordinateOptions> = {}
): CoordinateOptions {
  return { ...DEFAULT_COORDINATE_OPTIONS, ...options };
}
