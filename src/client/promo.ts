/**
 * Promo rotator: cyclic slide show on the store front page.
 *
 * Supports prev/next buttons, dot buttons (data-index), arrow keys while
 * the region has focus, and timed autoplay that pauses after a manual
 * click. Slides with a .promo-thumbs strip cross-fade their cover image to
 * the hovered or focused thumbnail.
 */
import { createScope, type ListenerScope } from './scope.js';
import { createLatestGuard } from './latest.js';
import type { ComponentHandle, PromoState } from './types.js';

export const REGION_SELECTOR = '.promo-outer';
const SLIDE_SELECTOR = '.promo-slide';
const DOT_SELECTOR = '.promo-dot';
const COVER_SELECTOR = '.promo-cover-image';
const THUMB_SELECTOR = '.promo-thumbs img';

const ACTIVE_MARKER = 'opacity-100';
const ACTIVE_CLASSES = [ACTIVE_MARKER, 'relative'];
const INACTIVE_CLASSES = ['opacity-0', 'pointer-events-none'];

export const AUTOPLAY_INTERVAL_MS = 6000;
export const AUTOPLAY_RESUME_DELAY_MS = 4000;
/** Half of the cover cross-fade: fade out, swap, fade in */
export const FADE_DURATION_MS = 180;

export interface PromoRotatorOptions {
  autoplay?: boolean;
  interval?: number;
  resumeDelay?: number;
  fadeDuration?: number;
}

export interface PromoRotatorHandle extends ComponentHandle {
  show: (index: number) => void;
  next: () => void;
  prev: () => void;
  currentIndex: () => number;
  startAutoplay: () => void;
  stopAutoplay: () => void;
  isAutoplaying: () => boolean;
}

/** Wrap any integer into [0, count). */
export function normalizeIndex(index: number, count: number): number {
  return ((index % count) + count) % count;
}

function parseIndex(el: Element): number | null {
  const idx = parseInt(el.getAttribute('data-index') ?? '', 10);
  return Number.isNaN(idx) ? null : idx;
}

/** Mark exactly one slide active and sync the dots to it. */
export function renderSlides(slides: readonly HTMLElement[], dots: readonly HTMLElement[], index: number): void {
  slides.forEach((slide, i) => {
    const active = i === index;
    for (const cls of ACTIVE_CLASSES) slide.classList.toggle(cls, active);
    for (const cls of INACTIVE_CLASSES) slide.classList.toggle(cls, !active);
    if (active) {
      slide.removeAttribute('aria-hidden');
    } else {
      slide.setAttribute('aria-hidden', 'true');
    }
  });

  for (const dot of dots) {
    const pressed = parseIndex(dot) === index;
    dot.setAttribute('aria-pressed', pressed ? 'true' : 'false');
    dot.classList.toggle('active', pressed);
  }
}

/** Cross-fade the slide's cover to hovered or focused thumbnails; stale fades never swap. */
function wireCoverPreview(slide: HTMLElement, scope: ListenerScope, fadeDuration: number): void {
  const cover = slide.querySelector<HTMLImageElement>(COVER_SELECTOR);
  const thumbs = slide.querySelectorAll<HTMLImageElement>(THUMB_SELECTOR);
  if (!cover || thumbs.length === 0) return;

  const originalSrc = cover.getAttribute('data-src') || cover.getAttribute('src');
  const fades = createLatestGuard();

  function fadeTo(src: string | null): void {
    if (!src || !cover) return;
    const token = fades.next();
    cover.style.opacity = '0';
    scope.timeout(() => {
      if (!fades.isLatest(token)) return;
      cover.src = src;
      cover.style.opacity = '1';
    }, fadeDuration);
  }

  for (const thumb of thumbs) {
    const thumbSrc = () => thumb.getAttribute('data-src') || thumb.getAttribute('src');
    scope.listen(thumb, 'mouseenter', () => fadeTo(thumbSrc()));
    scope.listen(thumb, 'focus', () => fadeTo(thumbSrc()));
    scope.listen(thumb, 'mouseleave', () => fadeTo(originalSrc));
    scope.listen(thumb, 'blur', () => fadeTo(originalSrc));
  }
}

export function createPromoRotator(region: HTMLElement, options: PromoRotatorOptions = {}): PromoRotatorHandle {
  const interval = options.interval ?? AUTOPLAY_INTERVAL_MS;
  const resumeDelay = options.resumeDelay ?? AUTOPLAY_RESUME_DELAY_MS;
  const fadeDuration = options.fadeDuration ?? FADE_DURATION_MS;
  const autoplayEnabled = options.autoplay ?? true;

  const scope = createScope();
  const slides = Array.from(region.querySelectorAll<HTMLElement>(SLIDE_SELECTOR));
  const dots = Array.from(region.querySelectorAll<HTMLElement>(DOT_SELECTOR));

  const initial = slides.findIndex(s => s.classList.contains(ACTIVE_MARKER));
  const state: PromoState = { index: initial === -1 ? 0 : initial, count: slides.length };

  let autoplayTimer: ReturnType<typeof setInterval> | null = null;
  let resumeTimer: ReturnType<typeof setTimeout> | null = null;

  function show(index: number): void {
    if (state.count === 0) return;
    state.index = normalizeIndex(index, state.count);
    renderSlides(slides, dots, state.index);
  }

  function startAutoplay(): void {
    if (state.count === 0 || scope.disposed) return;
    stopAutoplay();
    autoplayTimer = scope.interval(() => show(state.index + 1), interval);
  }

  function stopAutoplay(): void {
    if (autoplayTimer !== null) {
      scope.clear(autoplayTimer);
      autoplayTimer = null;
    }
  }

  /** Pause autoplay and restart it after a quiet period; newer clicks push the restart back. */
  function pauseForInteraction(): void {
    stopAutoplay();
    if (resumeTimer !== null) scope.clear(resumeTimer);
    resumeTimer = scope.timeout(() => {
      resumeTimer = null;
      if (autoplayEnabled) startAutoplay();
    }, resumeDelay);
  }

  const handle: PromoRotatorHandle = {
    show,
    next: () => show(state.index + 1),
    prev: () => show(state.index - 1),
    currentIndex: () => state.index,
    startAutoplay,
    stopAutoplay,
    isAutoplaying: () => autoplayTimer !== null,
    destroy: () => {
      autoplayTimer = null;
      resumeTimer = null;
      scope.dispose();
    },
  };

  if (state.count === 0) return handle;

  show(state.index);

  for (const btn of region.querySelectorAll<HTMLElement>('.promo-prev')) {
    scope.listen(btn, 'click', () => {
      show(state.index - 1);
      pauseForInteraction();
    });
  }
  for (const btn of region.querySelectorAll<HTMLElement>('.promo-next')) {
    scope.listen(btn, 'click', () => {
      show(state.index + 1);
      pauseForInteraction();
    });
  }
  for (const dot of dots) {
    scope.listen(dot, 'click', () => {
      const idx = parseIndex(dot);
      if (idx !== null) show(idx);
      pauseForInteraction();
    });
  }

  scope.listen(region, 'keydown', (e) => {
    if (e.key === 'ArrowLeft') {
      e.preventDefault();
      show(state.index - 1);
    } else if (e.key === 'ArrowRight') {
      e.preventDefault();
      show(state.index + 1);
    }
  });
  if (!region.hasAttribute('tabindex')) region.setAttribute('tabindex', '0');

  for (const slide of slides) {
    wireCoverPreview(slide, scope, fadeDuration);
  }

  if (autoplayEnabled) startAutoplay();

  return handle;
}
