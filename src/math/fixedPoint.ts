/**
 * Integer vector math for the fixed-point classifier.
 *
 * Values are plain JavaScript numbers restricted to safe integers. Division
 * truncates toward zero, and dot products divide every term by the scale
 * factor before summing; both rules are part of the determinism contract.
 */

import { SCALE } from "../constants.js";
import { ArithmeticOverflowError, ClassifierError } from "../errors.js";

/** Throws unless `value` is a safe integer. */
function checked(value: number, operation: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new ArithmeticOverflowError(operation);
  }
  // Normalize -0 so results compare equal under Object.is.
  return value === 0 ? 0 : value;
}

export function checkedAdd(a: number, b: number): number {
  return checked(a + b, "addition");
}

export function checkedMul(a: number, b: number): number {
  return checked(a * b, "multiplication");
}

/**
 * Integer division truncating toward zero.
 *
 * @throws {ClassifierError} when `denominator` is 0; callers guard that case.
 */
export function truncDiv(numerator: number, denominator: number): number {
  checked(numerator, "division");
  if (denominator === 0) {
    throw new ClassifierError("Division by zero");
  }
  let quotient = Math.trunc(numerator / denominator);
  const remainder = numerator - quotient * denominator;
  // Float rounding can overshoot by one at large magnitudes.
  if (remainder !== 0 && Math.sign(remainder) !== Math.sign(numerator)) {
    quotient -= Math.sign(numerator) * Math.sign(denominator);
  }
  return quotient === 0 ? 0 : quotient;
}

/** Adds 1 to `value` unless it already reached `max`. */
export function saturatingIncrement(value: number, max: number): number {
  return value >= max ? max : value + 1;
}

/**
 * Fixed-point dot product: `Σ trunc(a[i] * b[i] / SCALE)`.
 *
 * Only the overlapping prefix is used; callers always pass vectors of the
 * same fixed dimension.
 */
export function scaledDot(a: readonly number[], b: readonly number[]): number {
  const len = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < len; i++) {
    sum = checkedAdd(sum, truncDiv(checkedMul(a[i] ?? 0, b[i] ?? 0), SCALE));
  }
  return sum;
}

/** Adds `v * factor` into `target` in place. */
export function accumulateScaled(
  target: number[],
  v: readonly number[],
  factor: number,
): void {
  for (let i = 0; i < target.length; i++) {
    target[i] = checkedAdd(target[i] ?? 0, checkedMul(v[i] ?? 0, factor));
  }
}

/** Divides every component by `divisor`, leaving the vector untouched when it is 0. */
export function divideAll(v: readonly number[], divisor: number): number[] {
  if (divisor === 0) {
    return [...v];
  }
  return v.map((val) => truncDiv(val, divisor));
}

/** Returns a zero vector of the given length. */
export function zeros(length: number): number[] {
  return new Array<number>(length).fill(0);
}
