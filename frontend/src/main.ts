import './styles/site.css';
import { initSite } from './controllers/site';
import { pageLifecycleManager } from './lib/lifecycleManager';

// The page markup is server-rendered; wire the page script once it has been parsed.
function start() {
  const site = initSite(document);
  pageLifecycleManager.registerCleanup(site.dispose);
  pageLifecycleManager.attach(window);

  if (site.config.debug) {
    window.siteController = site;
  }
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', start, { once: true });
} else {
  start();
}
