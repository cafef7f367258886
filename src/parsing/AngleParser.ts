import { createCoordinateOptions } from "@/config/coordinatesConfig";
import { createLogger, type Logger } from "@/core/logger";
import { FormatError } from "@/errors";
import { DEGREES_PER_HOUR } from "@/math/Angle";
import type { CoordinateOptions } from "@/types";
import { splitString } from "./splitString";

/**
 * Sexagesimal angle parsing ("dd:mm:ss" and "hh:mm:ss").
 */

const MAX_FIELDS = 3;

function parseField(field: string, text: string): number {
  const trimmed = field.trim();
  const value = trimmed.length > 0 ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new FormatError(`Field "${field}" is not a number`, text);
  }
  return value;
}

function parseSexagesimal(text: string, delimiter: string, logger?: Logger): number {
  try {
    const fields = splitString(text, delimiter);
    if (fields.length === 0 || fields.length > MAX_FIELDS) {
      throw new FormatError(`Expected 1 to ${MAX_FIELDS} fields, got ${fields.length}`, text);
    }

    // Missing trailing fields contribute nothing
    const [d, m = 0, s = 0] = fields.map((field) => parseField(field, text));
    return d + (m + s / 60) / 60;
  } catch (error) {
    logger?.debug(`Rejected angle "${text}"`, error);
    throw error;
  }
}

/**
 * Transform a degrees-minutes-seconds string into decimal degrees.
 * The sign of the degrees field is not applied to minutes and seconds.
 *
 * @param text - Angle such as "10:30:00"
 * @param delimiter - Separator between fields (default: ":")
 * @throws FormatError for more than three fields or a non-numeric field
 */
export function parseDmsToDegrees(text: string, delimiter: string = ":"): number {
  return parseSexagesimal(text, delimiter);
}

/**
 * Transform an hours-minutes-seconds string into decimal degrees.
 *
 * @param text - Angle such as "01:00:00"
 * @param delimiter - Separator between fields (default: ":")
 * @throws FormatError for more than three fields or a non-numeric field
 */
export function parseHmsToDegrees(text: string, delimiter: string = ":"): number {
  return parseSexagesimal(text, delimiter) * DEGREES_PER_HOUR;
}

export interface AngleParser {
  readonly delimiter: string;
  parseDms(text: string): number;
  parseHms(text: string): number;
}

/**
 * Creates a parser bound to a configured delimiter and logger
 */
export function createAngleParser(options: Partial<CoordinateOptions> = {}): AngleParser {
  const { delimiter, logLevel } = createCoordinateOptions(options);
  const logger = createLogger("AngleParser", logLevel);

  return {
    delimiter,
    parseDms: (text) => parseSexagesimal(text, delimiter, logger),
    parseHms: (text) => parseSexagesimal(text, delimiter, logger) * DEGREES_PER_HOUR,
  };
}
