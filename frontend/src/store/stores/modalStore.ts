import { createStore } from 'zustand/vanilla';
import { devtools } from 'zustand/middleware';
import type { ModalState } from '../../types/ui-state';
import { createLogger } from '../../lib/log';

interface ModalStore {
  modal: ModalState;

  // Actions
  open: (url: string, title: string) => boolean;
  close: () => void;

  // Getters
  isVisible: () => boolean;
}

const hidden: ModalState = { status: 'hidden' };

export const createModalStore = ({ debug = false }: { debug?: boolean } = {}) => {
  const log = createLogger('ModalStore', () => debug);

  return createStore<ModalStore>()(
    devtools(
      (set, get) => ({
        modal: hidden,

        // A visible modal always carries a frame source
        open: (url: string, title: string) => {
          const target = url.trim();
          if (!target) {
            log.warn('Refusing to open preview without a URL', { title });
            return false;
          }
          log.debug('Opening preview', { url: target, title });
          set({ modal: { status: 'visible', url: target, title } }, false, 'open');
          return true;
        },

        close: () => {
          if (get().modal.status === 'hidden') return;
          log.debug('Closing preview');
          set({ modal: hidden }, false, 'close');
        },

        isVisible: () => get().modal.status === 'visible'
      }),
      {
        name: 'modal-store',
        enabled: debug
      }
    )
  );
};

export type ModalStoreApi = ReturnType<typeof createModalStore>;
export type { ModalStore };
