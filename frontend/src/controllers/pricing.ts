import {
  isPricingSummaryKey,
  pricingSummary,
  type PricingSummary
} from '../lib/pricing';
import { PricingError } from '../store/utils/errorHandling';
import { onElement, type ControllerContext } from './context';

const SCOPE = 'PricingController';

export function renderPricing(summary: PricingSummary, outputs: HTMLElement[]): void {
  for (const output of outputs) {
    const key = output.dataset.pricing;
    if (key && isPricingSummaryKey(key)) {
      output.textContent = String(summary[key]);
    }
  }
}

export function parsePageCount(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Fills `data-pricing` outputs from the published pricing policy and keeps them in step
 * with the page-count input. An unusable count leaves the last good summary on screen.
 */
export function bindPricing(
  ctx: ControllerContext,
  outputs: HTMLElement[],
  pagesInput: HTMLInputElement | null
): PricingSummary | null {
  const { config } = ctx;
  const log = ctx.logger(SCOPE);

  const summarise = (pages: number): PricingSummary | null => {
    try {
      return pricingSummary(pages, config.now());
    } catch (error) {
      if (error instanceof PricingError) {
        log.debug('Ignoring page count', { pages, reason: error.message });
        return null;
      }
      throw error;
    }
  };

  const initialPages = pagesInput ? parsePageCount(pagesInput.value) ?? 0 : 0;
  const initial = summarise(initialPages);
  if (initial) renderPricing(initial, outputs);

  if (pagesInput) {
    onElement(ctx, pagesInput, 'input', SCOPE, () => {
      const pages = parsePageCount(pagesInput.value);
      if (pages === null) return;
      const summary = summarise(pages);
      if (summary) renderPricing(summary, outputs);
    });
  }

  return initial;
}
