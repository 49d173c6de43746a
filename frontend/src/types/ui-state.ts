// types/ui-state.ts
export type DisclosureState = 'closed' | 'open';

export type SwipeDirection = 'swiped-left' | 'swiped-right';

export interface NavigationState {
  navigation: DisclosureState;
  // Keyed by the dropdown id assigned when the controller registers it
  dropdowns: Record<string, DisclosureState>;
}

export type ModalState =
  | { status: 'hidden' }
  | {
      status: 'visible';
      url: string;
      title: string;
    };

export interface PreviewRequest {
  url: string;
  title: string;
}

export interface SiteClassNames {
  navigationOpen: string;
  dropdownOpen: string;
  cardRevealed: string;
  swipedLeft: string;
  swipedRight: string;
  modalOpen: string;
}

export interface SiteSelectors {
  navToggle: string;
  navList: string;
  navLinks: string;
  dropdown: string;
  dropdownTrigger: string;
  interactiveCards: string;
  contactForm: string;
  emailInput: string;
  modal: string;
  modalFrame: string;
  modalTitle: string;
  modalClose: string;
  previewTriggers: string;
  pricingOutputs: string;
  pricingPagesInput: string;
}
