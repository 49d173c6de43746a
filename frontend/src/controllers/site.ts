import { resolveSiteConfig, type SiteConfig, type SiteConfigOverrides } from '../config/site';
import {
  ControllerErrorManager,
  createModalStore,
  createNavigationStore,
  withErrorHandling,
  type ModalStoreApi,
  type NavigationStoreApi
} from '../store';
import { createControllerContext } from './context';
import { querySiteElements, type SiteElements } from './elements';
import { bindNavigation } from './navigation';
import { bindModal } from './modal';
import { bindCards, type CardGestureTracker } from './cards';
import { bindContactForm } from './contactForm';
import { bindPricing } from './pricing';

export interface SiteController {
  config: SiteConfig;
  elements: SiteElements;
  navigation: NavigationStoreApi;
  modal: ModalStoreApi;
  cards: CardGestureTracker | null;
  errors: ControllerErrorManager;
  openPreview: (url: string, title?: string) => boolean;
  closePreview: () => void;
  closeNavigation: () => void;
  dispose: () => void;
}

/**
 * Wire the page script to already-rendered markup. Call once the document is parsed.
 * Features whose elements are missing stay disabled; nothing here throws into the page
 * once the config has resolved.
 */
export function initSite(root: Document, overrides: SiteConfigOverrides = {}): SiteController {
  const config = resolveSiteConfig(overrides);
  const errors = new ControllerErrorManager();
  const abort = new AbortController();
  const ctx = createControllerContext(config, abort.signal, errors);
  const log = ctx.logger('Site');

  const elements = querySiteElements(root, config.selectors, errors);
  const navigation = createNavigationStore({ debug: config.debug });
  const modal = createModalStore({ debug: config.debug });

  withErrorHandling('NavigationController', () => bindNavigation(ctx, navigation, elements, root), {}, errors);

  const modalElements = elements.modal;
  if (modalElements) {
    withErrorHandling(
      'ModalController',
      () => bindModal(ctx, modal, modalElements, elements.previewTriggers, root),
      {},
      errors
    );
  }

  const cards =
    elements.cards.length > 0
      ? withErrorHandling('CardGestures', () => bindCards(ctx, elements.cards), {}, errors)
      : null;

  const contactForm = elements.contactForm;
  if (contactForm) {
    withErrorHandling('ContactForm', () => bindContactForm(ctx, contactForm), {}, errors);
  }

  if (elements.pricingOutputs.length > 0) {
    withErrorHandling(
      'PricingController',
      () => bindPricing(ctx, elements.pricingOutputs, elements.pricingPagesInput),
      {},
      errors
    );
  }

  log.debug('Site controller ready', {
    dropdowns: elements.dropdowns.length,
    cards: elements.cards.length,
    modal: Boolean(modalElements),
    contactForm: Boolean(contactForm)
  });

  return {
    config,
    elements,
    navigation,
    modal,
    cards,
    errors,
    // Without a modal in the page there is nothing to show
    openPreview: (url: string, title: string = config.defaultPreviewTitle) =>
      modalElements ? modal.getState().open(url, title) : false,
    closePreview: () => modal.getState().close(),
    closeNavigation: () => navigation.getState().closeNavigation(),
    dispose: () => {
      if (abort.signal.aborted) return;
      abort.abort();
      log.debug('Site controller disposed');
    }
  };
}
