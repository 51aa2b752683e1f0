import { parseSignificantFigures } from '../schemas';
import type { Numeric, RoundingMode } from '../types';
import { applyModeToInteger, countDigits, roundToPlaces, shiftDecimal } from './primitive';

/**
 * Base-10 order of magnitude, `floor(log10(|value|))`.
 *
 * `Math.log10` may land just below an exact power of ten, so the estimate is checked against
 * the decimal powers on either side. Returns -Infinity for 0 and NaN for NaN.
 */
export const magnitude = (value: number): number => {
  const abs = Math.abs(value);
  const estimate = Math.floor(Math.log10(abs));

  if (!Number.isFinite(estimate)) return estimate;
  if (shiftDecimal(1, estimate) > abs) return estimate - 1;
  if (shiftDecimal(1, estimate + 1) <= abs) return estimate + 1;
  return estimate;
};

const roundIntegerToFigures = (value: bigint, figures: number, mode: RoundingMode): bigint => {
  const zeros = countDigits(value) - figures;
  if (zeros <= 0) return value;

  return applyModeToInteger(value, zeros, mode);
};

export function roundToSignificantFigures(value: number, figures: number, mode: RoundingMode): number;
export function roundToSignificantFigures(value: bigint, figures: number, mode: RoundingMode): bigint;
export function roundToSignificantFigures(value: Numeric, figures: number, mode: RoundingMode): Numeric;
export function roundToSignificantFigures(value: Numeric, figures: number, mode: RoundingMode): Numeric {
  const count = parseSignificantFigures(figures);

  if (typeof value === 'bigint') {
    return roundIntegerToFigures(value, count, mode);
  }

  // log10(0) is undefined; zero is its own answer for every mode.
  if (value === 0) return 0;
  if (!Number.isFinite(value)) return value;

  // The magnitude is taken once, before rounding. 9.96 -> 10.0 at 2 figures must not re-shift.
  return roundToPlaces(value, count - 1 - magnitude(value), mode);
}

/**
 * Round to a number of significant figures, ties away from zero.
 *
 * @example roundSf(123456, 4) // 123500
 * @example roundSf(0.0012345, 2) // 0.0012
 * @example roundSf(12345n, 3) // 12300n
 */
export function roundSf(value: number, figures: number): number;
export function roundSf(value: bigint, figures: number): bigint;
export function roundSf(value: Numeric, figures: number): Numeric;
export function roundSf(value: Numeric, figures: number): Numeric {
  return roundToSignificantFigures(value, figures, 'nearest');
}

/** Round up (towards +Infinity) to a number of significant figures. */
export function ceilSf(value: number, figures: number): number;
export function ceilSf(value: bigint, figures: number): bigint;
export function ceilSf(value: Numeric, figures: number): Numeric;
export function ceilSf(value: Numeric, figures: number): Numeric {
  return roundToSignificantFigures(value, figures, 'ceiling');
}

/** Round down (towards -Infinity) to a number of significant figures. */
export function floorSf(value: number, figures: number): number;
export function floorSf(value: bigint, figures: number): bigint;
export function floorSf(value: Numeric, figures: number): Numeric;
export function floorSf(value: Numeric, figures: number): Numeric {
  return roundToSignificantFigures(value, figures, 'floor');
}
