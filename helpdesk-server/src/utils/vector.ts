import { DimensionMismatchError } from "../errors";

type NumericVector = ArrayLike<number>;

export function dot(a: NumericVector, b: NumericVector): number {
  assertSameDim(a, b);
  let s = 0;
  for (let i = 0; i < a.length; i += 1) {
    s += a[i] * b[i];
  }
  return s;
}

export function norm(a: NumericVector): number {
  let s = 0;
  for (let i = 0; i < a.length; i += 1) {
    s += a[i] * a[i];
  }
  return Math.sqrt(s);
}

export function assertSameDim(a: NumericVector, b: NumericVector) {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
}

export const isFiniteVector = (vector: readonly number[]) =>
  vector.every((value) => Number.isFinite(value));
