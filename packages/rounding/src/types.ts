export type RoundingMode = 'nearest' | 'ceiling' | 'floor';

export type RoundingFamily = 'decimalPlaces' | 'zeros' | 'significantFigures';

/** `number` is the floating-point kind, `bigint` the integer kind. */
export type Numeric = number | bigint;

export type RoundingParameter = 'places' | 'zeros' | 'figures' | 'request';

export type DecimalPlacesRequest = {
  family: 'decimalPlaces';
  places: number;
  mode: RoundingMode;
};

export type ZerosRequest = {
  family: 'zeros';
  zeros: number;
  mode: RoundingMode;
};

export type SignificantFiguresRequest = {
  family: 'significantFigures';
  figures: number;
  mode: RoundingMode;
};

export type RoundingRequest = DecimalPlacesRequest | ZerosRequest | SignificantFiguresRequest;

export type Rounder = {
  (value: number): number;
  (value: bigint): bigint;
  (value: Numeric): Numeric;
  readonly request: RoundingRequest;
};
