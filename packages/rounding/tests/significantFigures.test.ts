import { describe, expect, it } from 'vitest';

import { ceilSf, floorSf, magnitude, roundSf } from '../src/algorithms/significantFigures';
import { InvalidParameterError } from '../src/errors';

const fullPrecision = [
  2.2909903526306152,
  -3.8125967979431152,
  476.63360834121704,
  0.1 + 0.2,
  31123092770576476,
  -123456789.12345679,
  Math.PI,
  -Math.E,
  1 / 3,
  2 ** 60,
];

describe('magnitude', () => {
  it('returns the power of ten at or below the value', () => {
    expect(magnitude(123456)).toBe(5);
    expect(magnitude(999.9)).toBe(2);
    expect(magnitude(1)).toBe(0);
    expect(magnitude(-0.05)).toBe(-2);
  });

  it('is exact on powers of ten', () => {
    expect(magnitude(1000)).toBe(3);
    expect(magnitude(0.001)).toBe(-3);
    expect(magnitude(1e15)).toBe(15);
  });

  it('has no magnitude for zero or NaN', () => {
    expect(magnitude(0)).toBe(Number.NEGATIVE_INFINITY);
    expect(magnitude(Number.NaN)).toBeNaN();
  });
});

describe('roundSf', () => {
  it('rounds to significant figures', () => {
    expect(roundSf(123456, 3)).toBe(123000);
    expect(roundSf(123456, 4)).toBe(123500);
    expect(roundSf(123.456, 2)).toBe(120);
    expect(roundSf(123.456, 3)).toBe(123);
    expect(roundSf(0.0012345, 2)).toBe(0.0012);
  });

  it('crosses a power of ten without re-shifting', () => {
    expect(roundSf(9.96, 2)).toBe(10);
    expect(roundSf(0.0999, 1)).toBe(0.1);
    expect(roundSf(9960n, 2)).toBe(10000n);
  });

  it('is symmetric under negation', () => {
    for (const value of [123456, 0.0012345, 9.96, 2.5]) {
      for (const figures of [1, 2, 3]) {
        expect(roundSf(-value, figures)).toBe(-roundSf(value, figures));
      }
    }
  });

  it('keeps more figures than a double needs', () => {
    expect(roundSf(1.5, 30)).toBe(1.5);
  });

  it('keeps bigint input exact', () => {
    expect(roundSf(12345n, 3)).toBe(12300n);
    expect(roundSf(123456789n, 5)).toBe(123460000n);
    expect(roundSf(-123456n, 2)).toBe(-120000n);
  });

  it('returns a bigint untouched when every digit is significant', () => {
    expect(roundSf(42n, 5)).toBe(42n);
    expect(roundSf(42n, 2)).toBe(42n);
  });
});

describe('ceilSf', () => {
  it('rounds towards +Infinity', () => {
    expect(ceilSf(1.21, 2)).toBe(1.3);
    expect(ceilSf(99.1, 2)).toBe(100);
    expect(ceilSf(1201n, 2)).toBe(1300n);
  });

  it('moves negative values towards zero', () => {
    expect(ceilSf(-1.23, 2)).toBe(-1.2);
    expect(ceilSf(-1299n, 2)).toBe(-1200n);
  });
});

describe('floorSf', () => {
  it('rounds towards -Infinity', () => {
    expect(floorSf(0.00987, 1)).toBe(0.009);
    expect(floorSf(-1.21, 2)).toBe(-1.3);
    expect(floorSf(1299n, 2)).toBe(1200n);
  });

  it('mirrors ceilSf under negation', () => {
    for (const value of [1.23, 0.00987, 45678]) {
      for (const figures of [1, 2, 3]) {
        expect(ceilSf(-value, figures)).toBe(-floorSf(value, figures));
        expect(floorSf(-value, figures)).toBe(-ceilSf(value, figures));
      }
    }
  });
});

describe('significant figure rounding', () => {
  const operations = [roundSf, ceilSf, floorSf];

  it('is idempotent', () => {
    for (const operation of operations) {
      for (const value of [123456, 0.0012345, 9.96, -1.23, 987.654]) {
        for (const figures of [1, 2, 3]) {
          const once = operation(value, figures);
          expect(operation(once, figures)).toBe(once);
        }
      }
      const exact = operation(-987654321n, 4);
      expect(operation(exact, 4)).toBe(exact);
    }
  });

  it('returns zero for zero input in every mode', () => {
    for (const operation of operations) {
      for (const figures of [1, 5]) {
        expect(operation(0, figures)).toBe(0);
        expect(operation(-0, figures)).toBe(0);
        expect(operation(0n, figures)).toBe(0n);
      }
    }
  });

  it('passes non-finite values through', () => {
    expect(roundSf(Number.POSITIVE_INFINITY, 3)).toBe(Number.POSITIVE_INFINITY);
    expect(floorSf(Number.NaN, 3)).toBeNaN();
  });

  it('rejects fewer than one figure', () => {
    for (const operation of operations) {
      expect(() => operation(123.456, 0)).toThrow(InvalidParameterError);
      expect(() => operation(0, 0)).toThrow(InvalidParameterError);
      expect(() => operation(5n, 0)).toThrow(InvalidParameterError);
      expect(() => operation(123.456, 1.5)).toThrow(InvalidParameterError);
    }
  });

  it('keeps ceil at or above and floor at or below full-precision doubles', () => {
    for (const value of fullPrecision) {
      for (let figures = 1; figures <= 20; figures += 1) {
        expect(ceilSf(value, figures)).toBeGreaterThanOrEqual(value);
        expect(floorSf(value, figures)).toBeLessThanOrEqual(value);
      }
    }
  });

  it('returns a double unchanged at seventeen or more figures', () => {
    for (const operation of operations) {
      for (const value of fullPrecision) {
        expect(operation(value, 17)).toBe(value);
        expect(operation(value, 18)).toBe(value);
      }
    }
    expect(ceilSf(476.63360834121704, 18)).toBe(476.63360834121704);
    expect(roundSf(2.2909903526306152, 17)).toBe(2.2909903526306152);
  });
});
