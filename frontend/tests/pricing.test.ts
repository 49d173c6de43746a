import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';

import {
  currentRate,
  formatCurrency,
  maintenanceCost,
  MAX_RATE,
  pricingSummary
} from '../src/lib/pricing';
import { PricingError } from '../src/store/utils/errorHandling';

const inYear = (year: number) => DateTime.fromObject({ year, month: 6, day: 1 });

describe('currentRate', () => {
  it('charges the base rate in the start year and before it', () => {
    expect(currentRate(inYear(2025))).toBe(2500);
    expect(currentRate(inYear(2023))).toBe(2500);
  });

  it('adds 5% after the first year', () => {
    expect(currentRate(inYear(2026))).toBe(2625);
  });

  it('compounds 10% a year from the second year, rounding half up', () => {
    expect(currentRate(inYear(2027))).toBe(2750);
    expect(currentRate(inYear(2028))).toBe(3025);
    expect(currentRate(inYear(2029))).toBe(3328);
    expect(currentRate(inYear(2030))).toBe(3660);
  });

  it('caps the rate', () => {
    expect(currentRate(inYear(2031))).toBe(MAX_RATE);
    expect(currentRate(inYear(2045))).toBe(MAX_RATE);
  });
});

describe('maintenanceCost', () => {
  it('adds the per-page fee to the base app fee', () => {
    expect(maintenanceCost(0)).toBe(2500);
    expect(maintenanceCost(3)).toBe(5500);
  });

  it('rejects negative and fractional page counts', () => {
    expect(() => maintenanceCost(-1)).toThrow(PricingError);
    expect(() => maintenanceCost(1.5)).toThrow('pageCount must be a whole number, got 1.5');
  });
});

describe('formatCurrency', () => {
  it('formats pence as pounds', () => {
    expect(formatCurrency(2500)).toBe('£25.00');
    expect(formatCurrency(123450)).toBe('£1,234.50');
  });
});

describe('pricingSummary', () => {
  it('summarises the pricing policy for a page count', () => {
    expect(pricingSummary(2, inYear(2027))).toEqual({
      currentRate: '£27.50/hour',
      maintenanceCost: '£45.00 total',
      pages: 2,
      baseAppFee: '£25.00',
      perPageFee: '£10.00/page',
      annualIncrease: '+5% after year 1, +10% compounded thereafter (capped at £40/hr)'
    });
  });
});
