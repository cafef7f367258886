/**
 * Error taxonomy. Every error is thrown synchronously where the problem is
 * detected; nothing in the library catches them.
 */

export class CoordinatesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CoordinatesError";
  }
}

/** Incompatible vector/matrix shapes */
export class DimensionError extends CoordinatesError {
  readonly expected: number;
  readonly actual: number;

  constructor(message: string, expected: number, actual: number) {
    super(`${message}: expected ${expected}, got ${actual}`);
    this.name = "DimensionError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** Angle string with the wrong number of fields or a non-numeric field */
export class FormatError extends CoordinatesError {
  readonly input: string;

  constructor(message: string, input: string) {
    super(`${message}: "${input}"`);
    this.name = "FormatError";
    this.input = input;
  }
}

/** Transformation name or rotation axis outside the recognized set */
export class UnknownTransformationError extends CoordinatesError {
  readonly value: string;

  constructor(message: string, value: string) {
    super(`${message}: "${value}"`);
    this.name = "UnknownTransformationError";
    this.value = value;
  }
}

/** Direction undefined for a point at the origin */
export class DomainError extends CoordinatesError {
  constructor(message: string) {
    super(message);
    this.name = "DomainError";
  }
}
