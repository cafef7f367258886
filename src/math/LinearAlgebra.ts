import { DimensionError } from "@/errors";
import type { Matrix, Vector } from "@/types";

/**
 * Dense linear algebra over row-major matrices of any size.
 * All functions are pure and return new arrays.
 */

function isMatrix(value: Vector | Matrix): value is Matrix {
  return value.length > 0 && typeof value[0] !== "number";
}

/**
 * Number of columns of a well-formed matrix.
 * Rejects empty and ragged matrices.
 */
function columnCount(m: Matrix): number {
  if (m.length === 0) {
    throw new DimensionError("Matrix must have at least one row", 1, 0);
  }
  const n = m[0].length;
  for (let i = 1; i < m.length; i++) {
    if (m[i].length !== n) {
      throw new DimensionError(`Ragged matrix, row ${i} length`, n, m[i].length);
    }
  }
  return n;
}

function vectorDot(x: Vector, y: Vector): number {
  if (x.length !== y.length) {
    throw new DimensionError("Illegal vector dimensions", x.length, y.length);
  }
  let sum = 0;
  for (let i = 0; i < x.length; i++) {
    sum += x[i] * y[i];
  }
  return sum;
}

function matrixMatrix(a: Matrix, b: Matrix): Matrix {
  const inner = columnCount(a);
  const nB = columnCount(b);
  if (inner !== b.length) {
    throw new DimensionError("Illegal matrix dimensions", inner, b.length);
  }

  const c: number[][] = [];
  for (let i = 0; i < a.length; i++) {
    const row = new Array<number>(nB).fill(0);
    for (let j = 0; j < nB; j++) {
      for (let k = 0; k < inner; k++) {
        row[j] += a[i][k] * b[k][j];
      }
    }
    c.push(row);
  }
  return c;
}

/**
 * y = A * x
 */
function matrixVector(a: Matrix, x: Vector): Vector {
  const n = columnCount(a);
  if (x.length !== n) {
    throw new DimensionError("Illegal matrix dimensions", n, x.length);
  }
  return a.map((row) => vectorDot(row, x));
}

/**
 * y = transpose(x) * A
 */
function vectorMatrix(x: Vector, a: Matrix): Vector {
  const n = columnCount(a);
  if (x.length !== a.length) {
    throw new DimensionError("Illegal matrix dimensions", a.length, x.length);
  }
  const y = new Array<number>(n).fill(0);
  for (let j = 0; j < n; j++) {
    for (let i = 0; i < a.length; i++) {
      y[j] += a[i][j] * x[i];
    }
  }
  return y;
}

/**
 * Dot product, dispatched on argument shape:
 * - vector · vector -> scalar
 * - matrix · matrix -> matrix
 * - matrix · vector -> column result
 * - vector · matrix -> row result
 *
 * @throws DimensionError when the shapes are incompatible
 */
export function dot(x: Vector, y: Vector): number;
export function dot(a: Matrix, b: Matrix): Matrix;
export function dot(a: Matrix, x: Vector): Vector;
export function dot(x: Vector, a: Matrix): Vector;
export function dot(left: Vector | Matrix, right: Vector | Matrix): number | Vector | Matrix {
  if (isMatrix(left)) {
    return isMatrix(right) ? matrixMatrix(left, right) : matrixVector(left, right);
  }
  return isMatrix(right) ? vectorMatrix(left, right) : vectorDot(left, right);
}

/**
 * C = transpose(A)
 */
export function transpose(a: Matrix): Matrix {
  const n = columnCount(a);
  const c: number[][] = [];
  for (let j = 0; j < n; j++) {
    c.push(a.map((row) => row[j]));
  }
  return c;
}
