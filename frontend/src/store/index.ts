// Main store exports
export type * from '../types/ui-state';

// Store exports
export { createNavigationStore } from './stores/navigationStore';
export type { NavigationStore, NavigationStoreApi } from './stores/navigationStore';
export { createModalStore } from './stores/modalStore';
export type { ModalStore, ModalStoreApi } from './stores/modalStore';

// Error handling exports
export {
  ControllerErrorManager,
  withErrorHandling,
  guardListener,
  SiteConfigError,
  PricingError
} from './utils/errorHandling';
