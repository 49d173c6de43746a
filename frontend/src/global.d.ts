// TypeScript global declarations for debugging hooks exposed on window
import type { SiteController } from './controllers/site';

declare global {
  interface ImportMetaEnv {
    // "true" turns on controller debug logging and zustand devtools
    readonly VITE_SITE_DEBUG?: string;
  }

  interface Window {
    siteController?: SiteController;
  }
}

export {}; // Ensures this file is treated as a module
