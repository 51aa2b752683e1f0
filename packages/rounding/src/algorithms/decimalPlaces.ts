import { parseDecimalPlaces } from '../schemas';
import type { RoundingMode } from '../types';
import { roundToPlaces } from './primitive';

/** Rounds `value` to `places` digits after the decimal point in the given mode. */
export const roundDecimalPlaces = (value: number, places: number, mode: RoundingMode): number =>
  roundToPlaces(value, parseDecimalPlaces(places), mode);

/**
 * Round to a number of decimal places, ties away from zero.
 *
 * @example round(123.456, 2) // 123.46
 * @example round(-2.5, 0) // -3
 */
export const round = (value: number, places: number): number =>
  roundDecimalPlaces(value, places, 'nearest');

/**
 * Round up (towards +Infinity) to a number of decimal places.
 *
 * @example ceil(123.454, 2) // 123.46
 * @example ceil(-123.456, 1) // -123.4
 */
export const ceil = (value: number, places: number): number =>
  roundDecimalPlaces(value, places, 'ceiling');

/**
 * Round down (towards -Infinity) to a number of decimal places.
 *
 * @example floor(123.456, 2) // 123.45
 * @example floor(-123.426, 1) // -123.5
 */
export const floor = (value: number, places: number): number =>
  roundDecimalPlaces(value, places, 'floor');
