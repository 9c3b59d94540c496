/**
 * Detail-page media gallery: clicking a thumbnail shows its media in the
 * main viewer and marks it active.
 */
import { createScope } from './scope.js';
import type { ComponentHandle } from './types.js';

export const MAIN_MEDIA_ID = 'mainMedia';
const THUMB_SELECTOR = '.thumbs .thumb';

export function createMediaGallery(root: ParentNode): ComponentHandle {
  const scope = createScope();
  const thumbs = Array.from(root.querySelectorAll<HTMLElement>(THUMB_SELECTOR));

  for (const thumb of thumbs) {
    scope.listen(thumb, 'click', () => {
      const main = root.querySelector(`#${MAIN_MEDIA_ID}`);
      const src = thumb.getAttribute('data-src');
      if (main && src) main.setAttribute('src', src);

      for (const other of thumbs) other.classList.toggle('active', other === thumb);
    });
  }

  return { destroy: scope.dispose };
}
