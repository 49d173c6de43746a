import type { SiteSelectors } from '../types/ui-state';
import { ControllerErrorManager, withErrorHandling } from '../store/utils/errorHandling';

export interface DropdownElements {
  id: string;
  container: HTMLElement;
  trigger: HTMLElement;
}

export interface ModalElements {
  container: HTMLElement;
  frame: HTMLIFrameElement | null;
  title: HTMLElement | null;
  close: HTMLElement | null;
}

/** Every element the page script manages; anything missing disables its feature. */
export interface SiteElements {
  body: HTMLElement | null;
  navToggle: HTMLElement | null;
  navList: HTMLElement | null;
  hoverLinks: HTMLElement[];
  dropdowns: DropdownElements[];
  cards: HTMLElement[];
  contactForm: HTMLFormElement | null;
  modal: ModalElements | null;
  previewTriggers: HTMLElement[];
  pricingOutputs: HTMLElement[];
  pricingPagesInput: HTMLInputElement | null;
}

const SCOPE = 'SiteElements';

const isHTMLElement = (node: Element | null): node is HTMLElement =>
  node !== null && node instanceof HTMLElement;

function queryOne(
  root: ParentNode,
  selector: string,
  errors: ControllerErrorManager
): HTMLElement | null {
  const found = withErrorHandling(SCOPE, () => root.querySelector(selector), { selector }, errors);
  return isHTMLElement(found) ? found : null;
}

function queryAll(root: ParentNode, selector: string, errors: ControllerErrorManager): HTMLElement[] {
  const found = withErrorHandling(
    SCOPE,
    () => Array.from(root.querySelectorAll(selector)),
    { selector },
    errors
  );
  return (found ?? []).filter(isHTMLElement);
}

// `#id` selectors go through getElementById so ids with unusual characters still resolve
function queryById(root: Document, selector: string, errors: ControllerErrorManager) {
  if (/^#[^\s.#[:>+~,]+$/.test(selector)) {
    return root.getElementById(selector.slice(1));
  }
  return queryOne(root, selector, errors);
}

function queryModal(
  root: Document,
  selectors: SiteSelectors,
  errors: ControllerErrorManager
): ModalElements | null {
  const container = queryById(root, selectors.modal, errors);
  if (!container) return null;

  const frame = queryOne(container, selectors.modalFrame, errors);
  return {
    container,
    frame: frame instanceof HTMLIFrameElement ? frame : null,
    title: queryOne(container, selectors.modalTitle, errors),
    close: queryOne(container, selectors.modalClose, errors)
  };
}

export function querySiteElements(
  root: Document,
  selectors: SiteSelectors,
  errors: ControllerErrorManager
): SiteElements {
  const dropdowns: DropdownElements[] = [];
  queryAll(root, selectors.dropdown, errors).forEach((container, index) => {
    const trigger = queryOne(container, selectors.dropdownTrigger, errors);
    if (trigger) {
      dropdowns.push({ id: `dropdown-${index}`, container, trigger });
    }
  });

  const contactForm = queryOne(root, selectors.contactForm, errors);
  const pricingPagesInput = queryOne(root, selectors.pricingPagesInput, errors);

  return {
    body: root.body,
    navToggle: queryOne(root, selectors.navToggle, errors),
    navList: queryById(root, selectors.navList, errors),
    hoverLinks: queryAll(root, selectors.navLinks, errors),
    dropdowns,
    cards: queryAll(root, selectors.interactiveCards, errors),
    contactForm: contactForm instanceof HTMLFormElement ? contactForm : null,
    modal: queryModal(root, selectors, errors),
    previewTriggers: queryAll(root, selectors.previewTriggers, errors),
    pricingOutputs: queryAll(root, selectors.pricingOutputs, errors),
    pricingPagesInput: pricingPagesInput instanceof HTMLInputElement ? pricingPagesInput : null
  };
}
