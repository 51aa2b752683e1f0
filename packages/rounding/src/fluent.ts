import { ceil, floor, round } from './algorithms/decimalPlaces';
import { ceilSf, floorSf, magnitude, roundSf } from './algorithms/significantFigures';
import { ceilZeros, floorZeros, roundZeros } from './algorithms/zeros';

export type RoundableInteger = {
  readonly value: bigint;
  roundZeros: (zeros: number) => bigint;
  ceilZeros: (zeros: number) => bigint;
  floorZeros: (zeros: number) => bigint;
  roundSf: (figures: number) => bigint;
  ceilSf: (figures: number) => bigint;
  floorSf: (figures: number) => bigint;
};

export type RoundableNumber = {
  readonly value: number;
  round: (places: number) => number;
  ceil: (places: number) => number;
  floor: (places: number) => number;
  roundZeros: (zeros: number) => number;
  ceilZeros: (zeros: number) => number;
  floorZeros: (zeros: number) => number;
  roundSf: (figures: number) => number;
  ceilSf: (figures: number) => number;
  floorSf: (figures: number) => number;
  magnitude: () => number;
};

const roundableInteger = (value: bigint): RoundableInteger => ({
  value,
  roundZeros: (zeros) => roundZeros(value, zeros),
  ceilZeros: (zeros) => ceilZeros(value, zeros),
  floorZeros: (zeros) => floorZeros(value, zeros),
  roundSf: (figures) => roundSf(value, figures),
  ceilSf: (figures) => ceilSf(value, figures),
  floorSf: (figures) => floorSf(value, figures),
});

const roundableNumber = (value: number): RoundableNumber => ({
  value,
  round: (places) => round(value, places),
  ceil: (places) => ceil(value, places),
  floor: (places) => floor(value, places),
  roundZeros: (zeros) => roundZeros(value, zeros),
  ceilZeros: (zeros) => ceilZeros(value, zeros),
  floorZeros: (zeros) => floorZeros(value, zeros),
  roundSf: (figures) => roundSf(value, figures),
  ceilSf: (figures) => ceilSf(value, figures),
  floorSf: (figures) => floorSf(value, figures),
  magnitude: () => magnitude(value),
});

/**
 * Method-call form of the rounding functions: `roundable(123.456).roundSf(2) === 120`.
 * Every method forwards to the free function of the same name.
 */
export function roundable(value: number): RoundableNumber;
export function roundable(value: bigint): RoundableInteger;
export function roundable(value: number | bigint): RoundableNumber | RoundableInteger {
  return typeof value === 'bigint' ? roundableInteger(value) : roundableNumber(value);
}
