import { UnknownTransformationError } from "@/errors";
import { radians } from "@/math/Angle";
import { GALACTIC_TO_ICRS, OBLIQUITY_J2000 } from "@/math/RotationMatrix";
import {
  TRANSFORMATION_FRAMES,
  TRANSFORMATION_NAMES,
  applyTransformation,
  createTransformer,
  getRotationMatrix,
  inverseTransformation,
  parseTransformationName,
  transformationBetween,
} from "@/transform/TransformationEngine";
import { longitudeDifference, range } from "@test/helpers/angleHelpers";
import { afterEach, describe, expect, it, vi } from "vitest";

const OBLIQUITY_DEG = (OBLIQUITY_J2000 * 180) / Math.PI;

describe("parseTransformationName", () => {
  it("should accept every name in any case", () => {
    for (const name of TRANSFORMATION_NAMES) {
      expect(parseTransformationName(name)).toBe(name);
      expect(parseTransformationName(name.toLowerCase())).toBe(name);
    }
    expect(parseTransformationName("Icrs2Gal")).toBe("ICRS2GAL");
  });

  it("should throw UnknownTransformationError for other names", () => {
    expect(() => parseTransformationName("GAL2FK5")).toThrow(UnknownTransformationError);
    expect(() => parseTransformationName("")).toThrow(UnknownTransformationError);
    expect(() => parseTransformationName(" ICRS2GAL")).toThrow(UnknownTransformationError);
  });

  it("should name the rejected value", () => {
    expect(() => parseTransformationName("GAL2FK5")).toThrow(
      'Cannot find this transformation name: "GAL2FK5"'
    );
  });
});

describe("getRotationMatrix", () => {
  it("should return the fixed constant for a name", () => {
    expect(getRotationMatrix("gal2icrs")).toBe(GALACTIC_TO_ICRS);
  });
});

describe("inverseTransformation / transformationBetween", () => {
  it.each(TRANSFORMATION_NAMES)("%s should swap its frames in the inverse", (name) => {
    const inverse = inverseTransformation(name);
    expect(TRANSFORMATION_FRAMES[inverse]).toEqual({
      from: TRANSFORMATION_FRAMES[name].to,
      to: TRANSFORMATION_FRAMES[name].from,
    });
    expect(inverseTransformation(inverse)).toBe(name);
  });

  it("should find the transformation between two frames", () => {
    expect(transformationBetween("icrs", "galactic")).toBe("ICRS2GAL");
    expect(transformationBetween("ecliptic", "icrs")).toBe("ECL2ICRS");
    expect(transformationBetween("galactic", "ecliptic")).toBe("GAL2ECL");
  });

  it("should throw for identical frames", () => {
    expect(() => transformationBetween("icrs", "icrs")).toThrow(UnknownTransformationError);
  });
});

describe("applyTransformation", () => {
  it("should throw UnknownTransformationError for an unknown name", () => {
    expect(() => applyTransformation("ICRS2FK4", 10, 10)).toThrow(UnknownTransformationError);
  });

  it("should place the galactic center near galactic (0, 0)", () => {
    const { lon, lat } = applyTransformation("ICRS2GAL", 266.4, -28.9);
    expect(lon).toBeCloseTo(0.0286, 3);
    expect(lat).toBeCloseTo(0.0226, 3);
  });

  it("should map the north galactic pole to its J2000 ICRS position", () => {
    const { lon, lat } = applyTransformation("GAL2ICRS", 0, 90);
    expect(longitudeDifference(lon, 192.85948)).toBeCloseTo(0, 9);
    expect(lat).toBeCloseTo(27.12825, 9);
  });

  it("should keep the vernal equinox at the ecliptic origin", () => {
    const { lon, lat } = applyTransformation("ICRS2ECL", 0, 0);
    expect(lon).toBeCloseTo(0, 12);
    expect(lat).toBeCloseTo(0, 12);
  });

  it("should tilt the ICRS y axis by the obliquity", () => {
    const toEcliptic = applyTransformation("ICRS2ECL", 90, 0);
    expect(toEcliptic.lon).toBeCloseTo(90, 12);
    expect(toEcliptic.lat).toBeCloseTo(-OBLIQUITY_DEG, 12);

    const solstice = applyTransformation("ECL2ICRS", 90, 0);
    expect(solstice.lon).toBeCloseTo(90, 12);
    expect(solstice.lat).toBeCloseTo(OBLIQUITY_DEG, 12);
  });

  it("should be case-insensitive", () => {
    expect(applyTransformation("icrs2gal", 83.6, 22.0)).toEqual(
      applyTransformation("ICRS2GAL", 83.6, 22.0)
    );
  });

  it("should report longitudes in (-180, 180]", () => {
    for (const name of TRANSFORMATION_NAMES) {
      for (const ra of range(0, 330, 30)) {
        const { lon } = applyTransformation(name, ra, 10);
        expect(lon).toBeGreaterThan(-180);
        expect(lon).toBeLessThanOrEqual(180);
      }
    }
  });

  it("should give the same answer in radians as in degrees", () => {
    const inDegrees = applyTransformation("GAL2ECL", 121.17, -21.57);
    const inRadians = applyTransformation("GAL2ECL", radians(121.17), radians(-21.57), false);
    expect(inRadians.lon).toBeCloseTo(radians(inDegrees.lon), 12);
    expect(inRadians.lat).toBeCloseTo(radians(inDegrees.lat), 12);
  });

  it.each(TRANSFORMATION_NAMES)("%s followed by its inverse should round trip", (name) => {
    const inverse = inverseTransformation(name);
    for (const lon of range(-180, 180, 30)) {
      for (const lat of range(-80, 80, 20)) {
        const forward = applyTransformation(name, lon, lat);
        const back = applyTransformation(inverse, forward.lon, forward.lat);
        expect(Math.abs(longitudeDifference(back.lon, lon))).toBeLessThan(1e-9);
        expect(Math.abs(back.lat - lat)).toBeLessThan(1e-9);
      }
    }
  });

  it("should round trip in radians", () => {
    const forward = applyTransformation("ECL2GAL", 2.5, -0.7, false);
    const back = applyTransformation("GAL2ECL", forward.lon, forward.lat, false);
    expect(back.lon).toBeCloseTo(2.5, 12);
    expect(back.lat).toBeCloseTo(-0.7, 12);
  });

  it("should keep the latitude at a pole", () => {
    const forward = applyTransformation("ICRS2ECL", 0, 90);
    const back = applyTransformation("ECL2ICRS", forward.lon, forward.lat);
    expect(back.lat).toBeCloseTo(90, 9);
  });
});

describe("createTransformer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should default to degrees", () => {
    const transformer = createTransformer();
    expect(transformer.useDegrees).toBe(true);
    expect(transformer.apply("ICRS2GAL", 266.4, -28.9)).toEqual(
      applyTransformation("ICRS2GAL", 266.4, -28.9)
    );
  });

  it("should bind radians when configured", () => {
    const transformer = createTransformer({ useDegrees: false });
    expect(transformer.apply("ECL2GAL", 1, 0.2)).toEqual(
      applyTransformation("ECL2GAL", 1, 0.2, false)
    );
  });

  it("should convert between frames by name", () => {
    const transformer = createTransformer();
    expect(transformer.convert("galactic", "icrs", 0, 90)).toEqual(
      applyTransformation("GAL2ICRS", 0, 90)
    );
  });

  it("should log applied transformations at debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const transformer = createTransformer({ logLevel: "debug" });

    transformer.apply("icrs2ecl", 0, 0);
    expect(debug).toHaveBeenCalledWith("[TransformationEngine] ICRS2ECL (0, 0) -> (0, 0) deg");
  });

  it("should not log through the plain function", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    applyTransformation("ICRS2ECL", 0, 0);
    expect(debug).not.toHaveBeenCalled();
  });
});
