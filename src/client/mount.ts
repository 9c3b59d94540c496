import { createCarousel } from './carousel.js';
import { createMediaGallery } from './gallery.js';
import { createPromoRotator, REGION_SELECTOR, type PromoRotatorOptions } from './promo.js';
import { createStarRating, GROUP_SELECTOR } from './star-rating.js';
import { createVoteClient } from './vote.js';
import type { ComponentHandle } from './types.js';

/**
 * Read per-region autoplay settings:
 *   data-autoplay="false"          no autoplay
 *   data-autoplay-interval="8000"  custom interval (invalid values keep the default)
 */
export function readPromoOptions(region: HTMLElement): PromoRotatorOptions {
  const options: PromoRotatorOptions = {};
  if (region.dataset.autoplay === 'false') options.autoplay = false;

  const rawInterval = region.dataset.autoplayInterval;
  if (rawInterval !== undefined) {
    const interval = Number(rawInterval);
    if (Number.isFinite(interval) && interval > 0) options.interval = interval;
  }
  return options;
}

/**
 * Attach every storefront widget found under root.
 * Returns one handle that tears all of them down.
 */
export function mountStorefront(root: Document | HTMLElement = document): ComponentHandle {
  const handles: ComponentHandle[] = [
    createMediaGallery(root),
    createCarousel(root),
    createVoteClient(root),
  ];

  for (const region of root.querySelectorAll<HTMLElement>(REGION_SELECTOR)) {
    handles.push(createPromoRotator(region, readPromoOptions(region)));
  }
  for (const group of root.querySelectorAll<HTMLElement>(GROUP_SELECTOR)) {
    handles.push(createStarRating(group));
  }

  return {
    destroy: () => {
      for (const handle of handles) handle.destroy();
    },
  };
}
