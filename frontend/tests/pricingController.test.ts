/* @vitest-environment jsdom */

import { DateTime } from 'luxon';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { initSite, type SiteController } from '../src/controllers/site';
import { parsePageCount } from '../src/controllers/pricing';
import { mount, query } from './fixtures/markup';

const PRICING_MARKUP = `
  <input type="number" value="2" data-pricing-pages />
  <span id="rate" data-pricing="currentRate"></span>
  <span id="maintenance" data-pricing="maintenanceCost"></span>
  <span id="pages" data-pricing="pages"></span>
  <span id="unknown" data-pricing="discount">unchanged</span>
`;

describe('pricing controller', () => {
  let site: SiteController;

  const text = (selector: string) => query(selector, HTMLElement).textContent;
  const typePages = (value: string) => {
    const input = query('input[data-pricing-pages]', HTMLInputElement);
    input.value = value;
    input.dispatchEvent(new Event('input', { bubbles: true }));
  };

  beforeEach(() => {
    mount(PRICING_MARKUP);
    site = initSite(document, {
      isNarrowViewport: () => false,
      notify: () => {},
      now: () => DateTime.fromObject({ year: 2026, month: 1, day: 15 })
    });
  });

  afterEach(() => {
    site.dispose();
  });

  it('fills the outputs from the starting page count', () => {
    expect(text('#rate')).toBe('£26.25/hour');
    expect(text('#maintenance')).toBe('£45.00 total');
    expect(text('#pages')).toBe('2');
  });

  it('leaves outputs with unknown keys alone', () => {
    expect(text('#unknown')).toBe('unchanged');
  });

  it('recomputes when the page count changes', () => {
    typePages('5');
    expect(text('#maintenance')).toBe('£75.00 total');
    expect(text('#pages')).toBe('5');
  });

  it('keeps the last summary for an unusable page count', () => {
    typePages('-3');
    expect(text('#maintenance')).toBe('£45.00 total');
    typePages('');
    expect(text('#pages')).toBe('2');
  });
});

describe('parsePageCount', () => {
  it('accepts whole non-negative numbers only', () => {
    expect(parsePageCount(' 12 ')).toBe(12);
    expect(parsePageCount('0')).toBe(0);
    expect(parsePageCount('1.5')).toBeNull();
    expect(parsePageCount('-1')).toBeNull();
    expect(parsePageCount('')).toBeNull();
  });
});
