import { InvalidParameterError } from '../errors';
import type { RoundingMode } from '../types';

/** Collapses -0 into 0 so results compare equal under Object.is. */
export const normalizeZero = (value: number): number => (value === 0 ? 0 : value);

/**
 * Moves the decimal point of `value` by `places` (right when positive, left when negative).
 *
 * Works on the exponent of the shortest decimal representation instead of multiplying by a
 * binary approximation of 10^places, so `shiftDecimal(1.005, 2)` is exactly `100.5`.
 */
export const shiftDecimal = (value: number, places: number): number => {
  const [mantissa = '0', exponent = '0'] = value.toString().split('e');
  return Number(`${mantissa}e${Number(exponent) + places}`);
};

/** `value === coefficient * 10^exponent`, read off the shortest decimal form of a finite value. */
export type DecimalParts = {
  coefficient: bigint;
  exponent: number;
};

export const toDecimalParts = (value: number): DecimalParts => {
  const [mantissa = '0', exponent = '0'] = value.toString().split('e');
  const [whole = '0', fraction = ''] = mantissa.split('.');

  return {
    coefficient: BigInt(`${whole}${fraction}`),
    exponent: Number(exponent) - fraction.length,
  };
};

const absBigInt = (value: bigint): bigint => (value < 0n ? -value : value);

/** Number of decimal digits in `|value|`; `0n` has one. */
export const countDigits = (value: bigint): number => absBigInt(value).toString().length;

/** 10n^exponent, or InvalidParameterError once the result would pass the largest bigint. */
export const powerOfTen = (exponent: number): bigint => {
  try {
    return 10n ** BigInt(exponent);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidParameterError('zeros', exponent, [
        { code: 'custom', path: [], message: 'Result exceeds the largest representable bigint' },
      ]);
    }
    throw error;
  }
};

/**
 * Drops the last `digits` digits of `value` and rounds the quotient in the given mode.
 * Ties go away from zero; ceiling and floor follow the sign of the remainder.
 */
export const roundQuotient = (value: bigint, digits: number, mode: RoundingMode): bigint => {
  if (digits <= 0) return value;

  if (digits > countDigits(value)) {
    // |value| < 10^(digits - 1): nearest is always 0.
    if (mode === 'ceiling') return value > 0n ? 1n : 0n;
    if (mode === 'floor') return value < 0n ? -1n : 0n;
    return 0n;
  }

  const power = 10n ** BigInt(digits);
  let quotient = value / power;
  const remainder = value % power;

  if (remainder === 0n) return quotient;

  if (mode === 'ceiling') {
    if (remainder > 0n) quotient += 1n;
  } else if (mode === 'floor') {
    if (remainder < 0n) quotient -= 1n;
  } else if (absBigInt(remainder) * 2n >= power) {
    quotient += remainder > 0n ? 1n : -1n;
  }

  return quotient;
};

/** Rounds `value` to a multiple of 10^zeros using exact integer arithmetic. */
export const applyModeToInteger = (value: bigint, zeros: number, mode: RoundingMode): bigint => {
  const quotient = roundQuotient(value, zeros, mode);
  return quotient === 0n ? 0n : quotient * powerOfTen(zeros);
};

/**
 * Rounds `value` to `places` decimal places; a negative count rounds left of the decimal point.
 *
 * The digits of the shortest decimal form are rounded once, as integers, so a value already at
 * `places` comes back unchanged and ceiling/floor never land on the wrong side of the input.
 * Zero returns 0 and non-finite values pass through.
 */
export const roundToPlaces = (value: number, places: number, mode: RoundingMode): number => {
  if (value === 0) return 0;
  if (!Number.isFinite(value)) return value;

  const { coefficient, exponent } = toDecimalParts(value);
  const dropped = -places - exponent;
  if (dropped <= 0) return value;

  const quotient = roundQuotient(coefficient, dropped, mode);
  return normalizeZero(Number(`${quotient}e${-places}`));
};
