/**
 * Browser entry point. Mounts the storefront widgets on the current page.
 *
 * Idempotent: including the script twice mounts once.
 */
import { mountStorefront } from './mount.js';

const INIT_FLAG = '__storefront_widgets_init';

declare global {
  interface Window {
    [INIT_FLAG]?: boolean;
  }
}

function init(): void {
  if (window[INIT_FLAG]) return;
  window[INIT_FLAG] = true;

  mountStorefront(document);
}

// Bootstrap on DOM ready
if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', init);
} else {
  init();
}
