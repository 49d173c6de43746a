import { debounce } from 'lodash';
import type { NavigationState, SiteClassNames } from '../types/ui-state';
import type { NavigationStoreApi } from '../store/stores/navigationStore';
import type { SiteElements } from './elements';
import { onAbort, onDocument, onElement, onWindow, type ControllerContext } from './context';

type NavigationElements = Pick<SiteElements, 'navToggle' | 'navList' | 'hoverLinks' | 'dropdowns'>;

const SCOPE = 'NavigationController';

const ariaExpanded = (open: boolean) => (open ? 'true' : 'false');

/** Writes navigation state to the DOM. The only code that touches these classes and aria attributes. */
export function renderNavigation(
  state: NavigationState,
  elements: NavigationElements,
  classes: SiteClassNames
): void {
  const open = state.navigation === 'open';
  if (elements.navList && elements.navToggle) {
    elements.navList.classList.toggle(classes.navigationOpen, open);
    elements.navToggle.setAttribute('aria-expanded', ariaExpanded(open));
  }

  for (const dropdown of elements.dropdowns) {
    const dropdownOpen = state.dropdowns[dropdown.id] === 'open';
    dropdown.container.classList.toggle(classes.dropdownOpen, dropdownOpen);
    dropdown.trigger.setAttribute('aria-expanded', ariaExpanded(dropdownOpen));
  }
}

export function bindNavigation(
  ctx: ControllerContext,
  store: NavigationStoreApi,
  elements: NavigationElements,
  root: Document
): void {
  const { config } = ctx;
  const log = ctx.logger(SCOPE);
  const { navToggle, navList } = elements;

  for (const dropdown of elements.dropdowns) {
    store.getState().registerDropdown(dropdown.id);
  }

  renderNavigation(store.getState(), elements, config.classes);
  const unsubscribe = store.subscribe(state => renderNavigation(state, elements, config.classes));
  onAbort(ctx, unsubscribe);

  for (const link of elements.hoverLinks) {
    onElement(ctx, link, 'mouseenter', SCOPE, () => {
      link.style.textDecoration = 'underline';
    });
    onElement(ctx, link, 'mouseleave', SCOPE, () => {
      link.style.textDecoration = 'none';
    });
  }

  if (navToggle && navList) {
    onElement(ctx, navToggle, 'click', SCOPE, () => store.getState().toggleNavigation());

    navList.querySelectorAll('a').forEach(link => {
      onElement(ctx, link, 'click', SCOPE, () => {
        if (config.isNarrowViewport() && !link.matches(config.selectors.dropdownTrigger)) {
          store.getState().closeNavigation();
        }
      });
    });
  } else {
    log.debug('Navigation toggle or list missing; toggle disabled');
  }

  // Wide viewports reveal dropdowns on hover through CSS, so the link keeps its default action
  for (const dropdown of elements.dropdowns) {
    onElement(ctx, dropdown.trigger, 'click', SCOPE, event => {
      if (!config.isNarrowViewport()) return;
      event.preventDefault();
      store.getState().toggleDropdown(dropdown.id);
    });
  }

  const view = root.defaultView;
  if (view) {
    const onResize = debounce(() => {
      if (!config.isNarrowViewport()) {
        store.getState().closeNavigation();
      }
    }, config.resizeDebounceMs);
    onWindow(ctx, view, 'resize', SCOPE, () => onResize());
    onAbort(ctx, () => onResize.cancel());
  }

  onDocument(ctx, root, 'keydown', SCOPE, event => {
    if (event.key !== 'Escape' || !store.getState().isNavigationOpen()) return;
    store.getState().closeNavigation();
    navToggle?.focus();
  });
}
