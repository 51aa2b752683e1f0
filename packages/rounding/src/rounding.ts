import { roundDecimalPlaces } from './algorithms/decimalPlaces';
import { roundToSignificantFigures } from './algorithms/significantFigures';
import { roundToZeros } from './algorithms/zeros';
import { parseRoundingRequest, type RoundingRequestInput } from './schemas';
import type { Numeric, Rounder, RoundingRequest } from './types';

const roundWithRequest = (value: Numeric, request: RoundingRequest): Numeric => {
  switch (request.family) {
    case 'decimalPlaces':
      // Integers have no decimals to drop.
      return typeof value === 'bigint' ? value : roundDecimalPlaces(value, request.places, request.mode);
    case 'zeros':
      return roundToZeros(value, request.zeros, request.mode);
    case 'significantFigures':
      return roundToSignificantFigures(value, request.figures, request.mode);
  }
};

/**
 * Rounds `value` according to a rounding rule held as data, e.g.
 * `{ family: 'significantFigures', figures: 3, mode: 'floor' }`. `mode` defaults to `'nearest'`.
 */
export function applyRounding(value: number, request: RoundingRequestInput): number;
export function applyRounding(value: bigint, request: RoundingRequestInput): bigint;
export function applyRounding(value: Numeric, request: RoundingRequestInput): Numeric;
export function applyRounding(value: Numeric, request: RoundingRequestInput): Numeric {
  return roundWithRequest(value, parseRoundingRequest(request));
}

/** Validates `request` up front and returns a reusable rounding function. */
export const createRounder = (request: RoundingRequestInput): Rounder => {
  const parsed = parseRoundingRequest(request);

  function rounder(value: number): number;
  function rounder(value: bigint): bigint;
  function rounder(value: Numeric): Numeric;
  function rounder(value: Numeric): Numeric {
    return roundWithRequest(value, parsed);
  }

  return Object.assign(rounder, { request: parsed });
};
