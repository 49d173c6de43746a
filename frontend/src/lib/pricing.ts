import { DateTime } from 'luxon';
import { PricingError } from '../store/utils/errorHandling';

// All amounts are held in whole pence.
export const BASE_RATE = 2500;
export const START_YEAR = 2025;
export const BASE_APP_FEE = 2500;
export const PER_PAGE_FEE = 1000;
export const MAX_RATE = 4000;

export const ANNUAL_INCREASE_NOTE =
  '+5% after year 1, +10% compounded thereafter (capped at £40/hr)';

export interface PricingSummary {
  currentRate: string;
  maintenanceCost: string;
  pages: number;
  baseAppFee: string;
  perPageFee: string;
  annualIncrease: string;
}

export type PricingSummaryKey = keyof PricingSummary;

export const PRICING_SUMMARY_KEYS: readonly PricingSummaryKey[] = [
  'currentRate',
  'maintenanceCost',
  'pages',
  'baseAppFee',
  'perPageFee',
  'annualIncrease'
];

const currencyFormatter = new Intl.NumberFormat('en-GB', {
  style: 'currency',
  currency: 'GBP',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

// Half-up division of non-negative integers
const divideHalfUp = (numerator: number, denominator: number) =>
  Math.floor((2 * numerator + denominator) / (2 * denominator));

/**
 * Hourly development rate in pence for the year of `referenceDate`.
 *
 * Year one after the start year adds 5%; from the second year the base rate compounds
 * at 10% a year, capped at {@link MAX_RATE}.
 */
export function currentRate(referenceDate: DateTime = DateTime.now()): number {
  const yearsElapsed = Math.max(0, referenceDate.year - START_YEAR);

  if (yearsElapsed === 0) return BASE_RATE;
  if (yearsElapsed === 1) return divideHalfUp(BASE_RATE * 105, 100);

  let numerator = BASE_RATE * 11;
  let denominator = 10;
  for (let year = 2; year < yearsElapsed; year++) {
    numerator *= 11;
    denominator *= 10;
    if (numerator >= MAX_RATE * denominator) return MAX_RATE;
  }

  return Math.min(divideHalfUp(numerator, denominator), MAX_RATE);
}

export function maintenanceCost(pageCount: number): number {
  if (!Number.isInteger(pageCount)) {
    throw new PricingError(`pageCount must be a whole number, got ${pageCount}`);
  }
  if (pageCount < 0) {
    throw new PricingError('pageCount cannot be negative');
  }
  return BASE_APP_FEE + PER_PAGE_FEE * pageCount;
}

export function formatCurrency(pence: number): string {
  return currencyFormatter.format(Math.round(pence) / 100);
}

export function pricingSummary(
  pageCount: number,
  referenceDate: DateTime = DateTime.now()
): PricingSummary {
  const rate = currentRate(referenceDate);
  const maintenance = maintenanceCost(pageCount);

  return {
    currentRate: `${formatCurrency(rate)}/hour`,
    maintenanceCost: `${formatCurrency(maintenance)} total`,
    pages: pageCount,
    baseAppFee: formatCurrency(BASE_APP_FEE),
    perPageFee: `${formatCurrency(PER_PAGE_FEE)}/page`,
    annualIncrease: ANNUAL_INCREASE_NOTE
  };
}

export function isPricingSummaryKey(value: string): value is PricingSummaryKey {
  return PRICING_SUMMARY_KEYS.some(key => key === value);
}
