import { z } from 'zod';

import { InvalidParameterError } from './errors';
import type { RoundingParameter } from './types';

export const roundingModeSchema = z.enum(['nearest', 'ceiling', 'floor']);

export const roundingFamilySchema = z.enum(['decimalPlaces', 'zeros', 'significantFigures']);

export const decimalPlacesSchema = z.number().int().min(0);
export const zerosSchema = z.number().int().min(0);
export const significantFiguresSchema = z.number().int().min(1);

export const roundingRequestSchema = z.discriminatedUnion('family', [
  z.object({
    family: z.literal('decimalPlaces'),
    places: decimalPlacesSchema,
    mode: roundingModeSchema.default('nearest'),
  }).strict(),
  z.object({
    family: z.literal('zeros'),
    zeros: zerosSchema,
    mode: roundingModeSchema.default('nearest'),
  }).strict(),
  z.object({
    family: z.literal('significantFigures'),
    figures: significantFiguresSchema,
    mode: roundingModeSchema.default('nearest'),
  }).strict(),
]);

export type RoundingRequestInput = z.input<typeof roundingRequestSchema>;
export type ParsedRoundingRequest = z.infer<typeof roundingRequestSchema>;

const parseParameter = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  parameter: RoundingParameter,
  received: unknown,
): T => {
  const parsed = schema.safeParse(received);
  if (!parsed.success) {
    throw new InvalidParameterError(parameter, received, parsed.error.issues);
  }
  return parsed.data;
};

export const parseDecimalPlaces = (places: number): number =>
  parseParameter(decimalPlacesSchema, 'places', places);

export const parseZeros = (zeros: number): number =>
  parseParameter(zerosSchema, 'zeros', zeros);

export const parseSignificantFigures = (figures: number): number =>
  parseParameter(significantFiguresSchema, 'figures', figures);

export const parseRoundingRequest = (request: unknown): ParsedRoundingRequest =>
  parseParameter(roundingRequestSchema, 'request', request);
