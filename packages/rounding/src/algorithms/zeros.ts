import { parseZeros } from '../schemas';
import type { Numeric, RoundingMode } from '../types';
import { applyModeToInteger, roundToPlaces } from './primitive';

export function roundToZeros(value: number, zeros: number, mode: RoundingMode): number;
export function roundToZeros(value: bigint, zeros: number, mode: RoundingMode): bigint;
export function roundToZeros(value: Numeric, zeros: number, mode: RoundingMode): Numeric;
export function roundToZeros(value: Numeric, zeros: number, mode: RoundingMode): Numeric {
  const count = parseZeros(zeros);

  if (typeof value === 'bigint') {
    return applyModeToInteger(value, count, mode);
  }

  return roundToPlaces(value, -count, mode);
}

/**
 * Round to the nearest multiple of 10^zeros, ties away from zero.
 *
 * @example roundZeros(123.456, 1) // 120
 * @example roundZeros(12345n, 1) // 12350n
 */
export function roundZeros(value: number, zeros: number): number;
export function roundZeros(value: bigint, zeros: number): bigint;
export function roundZeros(value: Numeric, zeros: number): Numeric;
export function roundZeros(value: Numeric, zeros: number): Numeric {
  return roundToZeros(value, zeros, 'nearest');
}

/**
 * Round up to a multiple of 10^zeros.
 *
 * @example ceilZeros(123, 2) // 200
 * @example ceilZeros(-12645n, 3) // -12000n
 */
export function ceilZeros(value: number, zeros: number): number;
export function ceilZeros(value: bigint, zeros: number): bigint;
export function ceilZeros(value: Numeric, zeros: number): Numeric;
export function ceilZeros(value: Numeric, zeros: number): Numeric {
  return roundToZeros(value, zeros, 'ceiling');
}

/**
 * Round down to a multiple of 10^zeros.
 *
 * @example floorZeros(156, 2) // 100
 * @example floorZeros(-12345n, 3) // -13000n
 */
export function floorZeros(value: number, zeros: number): number;
export function floorZeros(value: bigint, zeros: number): bigint;
export function floorZeros(value: Numeric, zeros: number): Numeric;
export function floorZeros(value: Numeric, zeros: number): Numeric {
  return roundToZeros(value, zeros, 'floor');
}
