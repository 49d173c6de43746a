import { createStore } from 'zustand/vanilla';
import { devtools } from 'zustand/middleware';
import type { DisclosureState, NavigationState } from '../../types/ui-state';
import { createLogger } from '../../lib/log';

export interface NavigationStore extends NavigationState {
  // Actions
  registerDropdown: (id: string) => void;
  toggleNavigation: () => void;
  closeNavigation: () => void;
  toggleDropdown: (id: string) => void;
  closeDropdowns: () => void;

  // Getters
  isNavigationOpen: () => boolean;
  isDropdownOpen: (id: string) => boolean;
}

const closeAll = (dropdowns: Record<string, DisclosureState>): Record<string, DisclosureState> => {
  const closed: Record<string, DisclosureState> = {};
  for (const id of Object.keys(dropdowns)) {
    closed[id] = 'closed';
  }
  return closed;
};

export const createNavigationStore = ({ debug = false }: { debug?: boolean } = {}) => {
  const log = createLogger('NavigationStore', () => debug);

  return createStore<NavigationStore>()(
    devtools(
      (set, get) => ({
        navigation: 'closed',
        dropdowns: {},

        registerDropdown: (id: string) => {
          if (id in get().dropdowns) return;
          set(
            state => ({ dropdowns: { ...state.dropdowns, [id]: 'closed' } }),
            false,
            'registerDropdown'
          );
        },

        // Closing through the toggle also collapses every dropdown
        toggleNavigation: () => {
          const next: DisclosureState = get().navigation === 'open' ? 'closed' : 'open';
          log.debug('Toggling navigation', { navigation: next });
          set({ navigation: next }, false, 'toggleNavigation');
          if (next === 'closed') get().closeDropdowns();
        },

        closeNavigation: () => {
          const { navigation, dropdowns } = get();
          const anyDropdownOpen = Object.values(dropdowns).some(value => value === 'open');
          if (navigation === 'closed' && !anyDropdownOpen) return;
          log.debug('Closing navigation', { previous: navigation });
          set({ navigation: 'closed' }, false, 'closeNavigation');
          get().closeDropdowns();
        },

        toggleDropdown: (id: string) => {
          const current = get().dropdowns[id];
          if (current === undefined) {
            log.warn('Ignoring toggle for unregistered dropdown', { id });
            return;
          }
          const next: DisclosureState = current === 'open' ? 'closed' : 'open';
          log.debug('Toggling dropdown', { id, state: next });
          set(
            state => ({ dropdowns: { ...state.dropdowns, [id]: next } }),
            false,
            'toggleDropdown'
          );
        },

        closeDropdowns: () => {
          set(state => ({ dropdowns: closeAll(state.dropdowns) }), false, 'closeDropdowns');
        },

        // Getters
        isNavigationOpen: () => get().navigation === 'open',
        isDropdownOpen: (id: string) => get().dropdowns[id] === 'open'
      }),
      {
        name: 'navigation-store',
        enabled: debug
      }
    )
  );
};

export type NavigationStoreApi = ReturnType<typeof createNavigationStore>;
