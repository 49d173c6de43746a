import type { ModalState, PreviewRequest, SiteClassNames } from '../types/ui-state';
import type { ModalStoreApi } from '../store/stores/modalStore';
import type { ModalElements } from './elements';
import { onAbort, onDocument, onElement, type ControllerContext } from './context';

const SCOPE = 'ModalController';

/**
 * Writes modal state to the DOM. Hiding clears the frame source before anything else
 * so an in-flight page load stops with the overlay.
 */
export function renderModal(
  state: ModalState,
  elements: ModalElements,
  body: HTMLElement | null,
  classes: SiteClassNames
): void {
  const { container, frame, title } = elements;

  if (state.status === 'hidden') {
    if (frame && frame.getAttribute('src')) {
      frame.setAttribute('src', '');
    }
    container.setAttribute('hidden', '');
    body?.classList.remove(classes.modalOpen);
    return;
  }

  frame?.setAttribute('src', state.url);
  if (title) title.textContent = state.title;
  container.removeAttribute('hidden');
  body?.classList.add(classes.modalOpen);
}

export function readPreviewRequest(trigger: HTMLElement, defaultTitle: string): PreviewRequest | null {
  const url = trigger.dataset.previewUrl?.trim();
  if (!url) return null;
  return { url, title: trigger.dataset.previewTitle || defaultTitle };
}

export function bindModal(
  ctx: ControllerContext,
  store: ModalStoreApi,
  elements: ModalElements,
  triggers: HTMLElement[],
  root: Document
): void {
  const { config } = ctx;
  const log = ctx.logger(SCOPE);
  const body = root.body;

  renderModal(store.getState().modal, elements, body, config.classes);
  const unsubscribe = store.subscribe((state, previous) => {
    if (state.modal !== previous.modal) {
      renderModal(state.modal, elements, body, config.classes);
    }
  });
  onAbort(ctx, unsubscribe);

  for (const trigger of triggers) {
    onElement(ctx, trigger, 'click', SCOPE, () => {
      const request = readPreviewRequest(trigger, config.defaultPreviewTitle);
      if (!request) {
        log.warn('Preview trigger has no data-preview-url');
        return;
      }
      store.getState().open(request.url, request.title);
    });
  }

  if (elements.close) {
    onElement(ctx, elements.close, 'click', SCOPE, () => store.getState().close());
  }

  // Only a click on the backdrop itself closes; clicks inside the content bubble up with another target
  onElement(ctx, elements.container, 'click', SCOPE, event => {
    if (event.target === elements.container) {
      store.getState().close();
    }
  });

  onDocument(ctx, root, 'keydown', SCOPE, event => {
    if (event.key === 'Escape' && store.getState().isVisible()) {
      store.getState().close();
    }
  });
}
