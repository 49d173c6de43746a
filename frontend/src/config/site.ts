import { cloneDeep, merge } from 'lodash';
import { DateTime } from 'luxon';
import type { SiteClassNames, SiteSelectors } from '../types/ui-state';
import { SiteConfigError } from '../store/utils/errorHandling';

/** Viewport width (px) at or below which navigation and dropdowns switch to tap-to-toggle. */
export const NAV_BREAKPOINT = 992;
export const SWIPE_THRESHOLD = 80;
export const SWIPE_RESET_MS = 600;
export const RESIZE_DEBOUNCE_MS = 100;

export interface SiteConfig {
  breakpoint: number;
  swipeThreshold: number;
  swipeResetMs: number;
  resizeDebounceMs: number;
  defaultPreviewTitle: string;
  invalidEmailMessage: string;
  debug: boolean;
  classes: SiteClassNames;
  selectors: SiteSelectors;
  isNarrowViewport: () => boolean;
  notify: (message: string) => void;
  now: () => DateTime;
}

export type SiteConfigOverrides = Partial<
  Omit<SiteConfig, 'classes' | 'selectors'> & {
    classes: Partial<SiteClassNames>;
    selectors: Partial<SiteSelectors>;
  }
>;

export const defaultClassNames: SiteClassNames = {
  navigationOpen: 'nav-list--open',
  dropdownOpen: 'dropdown-open',
  cardRevealed: 'revealed',
  swipedLeft: 'swiped-left',
  swipedRight: 'swiped-right',
  modalOpen: 'modal-open'
};

export const defaultSelectors: SiteSelectors = {
  navToggle: '.navbar-toggle',
  navList: '#primary-navigation',
  navLinks: '.nav-list a',
  dropdown: '.dropdown',
  dropdownTrigger: '.dropbtn',
  interactiveCards: '.service-card.interactive, .price-card.interactive',
  contactForm: '.contact-form',
  emailInput: 'input[type="email"]',
  modal: '#portfolioPreviewModal',
  modalFrame: 'iframe',
  modalTitle: '.portfolio-modal-title',
  modalClose: '.portfolio-modal-close',
  previewTriggers: '.preview-btn, [data-preview-url]',
  pricingOutputs: '[data-pricing]',
  pricingPagesInput: 'input[data-pricing-pages]'
};

export function viewportQuery(breakpoint: number): string {
  return `(max-width: ${breakpoint}px)`;
}

export function createViewportProbe(breakpoint: number): () => boolean {
  return () => {
    if (typeof window === 'undefined') return false;
    if (typeof window.matchMedia === 'function') {
      return window.matchMedia(viewportQuery(breakpoint)).matches;
    }
    return window.innerWidth <= breakpoint;
  };
}

const alertNotifier = (message: string) => {
  if (typeof window !== 'undefined' && typeof window.alert === 'function') {
    window.alert(message);
  }
};

function readDebugFlag(): boolean {
  return import.meta.env?.VITE_SITE_DEBUG === 'true';
}

function assertNonNegative(value: number, field: string) {
  if (!Number.isFinite(value) || value < 0) {
    throw new SiteConfigError(`${field} must be a non-negative number, got ${value}`, field);
  }
}

export function resolveSiteConfig(overrides: SiteConfigOverrides = {}): SiteConfig {
  const base = {
    breakpoint: NAV_BREAKPOINT,
    swipeThreshold: SWIPE_THRESHOLD,
    swipeResetMs: SWIPE_RESET_MS,
    resizeDebounceMs: RESIZE_DEBOUNCE_MS,
    defaultPreviewTitle: 'Project preview',
    invalidEmailMessage: 'Please enter a valid email address.',
    debug: readDebugFlag(),
    classes: cloneDeep(defaultClassNames),
    selectors: cloneDeep(defaultSelectors)
  };

  const { isNarrowViewport, notify, now, classes, selectors, ...scalars } = overrides;
  const resolved = merge(base, scalars, { classes: classes ?? {}, selectors: selectors ?? {} });

  if (!Number.isFinite(resolved.breakpoint) || resolved.breakpoint <= 0) {
    throw new SiteConfigError(
      `breakpoint must be a positive number, got ${resolved.breakpoint}`,
      'breakpoint'
    );
  }
  assertNonNegative(resolved.swipeThreshold, 'swipeThreshold');
  assertNonNegative(resolved.swipeResetMs, 'swipeResetMs');
  assertNonNegative(resolved.resizeDebounceMs, 'resizeDebounceMs');

  return {
    ...resolved,
    isNarrowViewport: isNarrowViewport ?? createViewportProbe(resolved.breakpoint),
    notify: notify ?? alertNotifier,
    now: now ?? (() => DateTime.now())
  };
}
