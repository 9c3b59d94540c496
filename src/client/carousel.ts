/**
 * Carousel engine for horizontal media strips.
 *
 * Markup:
 *   <div class="carousel">
 *     <button class="carousel-arrow left" data-target="shots"></button>
 *     <div class="carousel-track" data-carousel="shots">…</div>
 *     <button class="carousel-arrow right" data-target="shots"></button>
 *   </div>
 *
 * Arrows page the track by most of its visible width; the wrapper gets
 * has-left / has-right edge-fade classes and the arrows are disabled at
 * either end.
 */
import { createScope } from './scope.js';
import type { ComponentHandle, EdgeState, ScrollDirection, TrackMetrics } from './types.js';

export const TRACK_SELECTOR = '.carousel-track';
export const ARROW_SELECTOR = '.carousel-arrow';
const WRAPPER_SELECTOR = '.carousel';

export const EDGE_TOLERANCE_PX = 2;
export const PAGE_FRACTION = 0.9;
/** Delay before re-reading position after a programmatic scroll */
export const SETTLE_DELAY_MS = 60;

export interface CarouselOptions {
  edgeTolerance?: number;
  pageFraction?: number;
  settleDelay?: number;
}

export interface CarouselHandle extends ComponentHandle {
  scrollToPage: (name: string, direction: ScrollDirection) => void;
  refreshEdgeState: (track: HTMLElement) => EdgeState;
}

export function readTrackMetrics(track: HTMLElement): TrackMetrics {
  return {
    scrollLeft: track.scrollLeft,
    scrollWidth: track.scrollWidth,
    clientWidth: track.clientWidth,
  };
}

export function computeEdgeState(metrics: TrackMetrics, tolerance = EDGE_TOLERANCE_PX): EdgeState {
  return {
    atStart: metrics.scrollLeft <= tolerance,
    atEnd: metrics.scrollLeft + metrics.clientWidth >= metrics.scrollWidth - tolerance,
  };
}

/** Apply edge state to the track's wrapper and its arrows. No wrapper, no-op. */
export function renderEdgeState(track: HTMLElement, state: EdgeState): void {
  const wrap = track.closest(WRAPPER_SELECTOR);
  if (!wrap) return;

  wrap.classList.toggle('has-left', !state.atStart);
  wrap.classList.toggle('has-right', !state.atEnd);

  const leftBtn = wrap.querySelector(`${ARROW_SELECTOR}.left`);
  const rightBtn = wrap.querySelector(`${ARROW_SELECTOR}.right`);
  if (leftBtn) setArrowDisabled(leftBtn, state.atStart);
  if (rightBtn) setArrowDisabled(rightBtn, state.atEnd);
}

function setArrowDisabled(arrow: Element, disabled: boolean): void {
  arrow.classList.toggle('disabled', disabled);
  arrow.setAttribute('aria-disabled', disabled ? 'true' : 'false');
}

/**
 * Wire every carousel track and arrow under root.
 */
export function createCarousel(root: ParentNode, options: CarouselOptions = {}): CarouselHandle {
  const tolerance = options.edgeTolerance ?? EDGE_TOLERANCE_PX;
  const pageFraction = options.pageFraction ?? PAGE_FRACTION;
  const settleDelay = options.settleDelay ?? SETTLE_DELAY_MS;

  const scope = createScope();
  const tracks = Array.from(root.querySelectorAll<HTMLElement>(TRACK_SELECTOR));

  function refreshEdgeState(track: HTMLElement): EdgeState {
    const state = computeEdgeState(readTrackMetrics(track), tolerance);
    renderEdgeState(track, state);
    return state;
  }

  function scrollToPage(name: string, direction: ScrollDirection): void {
    const track = tracks.find(t => t.dataset.carousel === name);
    if (!track) return;

    const amount = track.clientWidth * pageFraction;
    track.scrollBy({ left: direction * amount, behavior: 'smooth' });
    scope.timeout(() => refreshEdgeState(track), settleDelay);
  }

  for (const track of tracks) {
    // Vertical wheel drives the strip sideways
    scope.listen(track, 'wheel', (e) => {
      if (Math.abs(e.deltaX) < Math.abs(e.deltaY)) {
        track.scrollLeft += e.deltaY;
        e.preventDefault();
      }
    }, { passive: false });

    scope.listen(track, 'scroll', () => refreshEdgeState(track), { passive: true });
  }

  for (const arrow of root.querySelectorAll<HTMLElement>(ARROW_SELECTOR)) {
    scope.listen(arrow, 'click', () => {
      const name = arrow.getAttribute('data-target');
      if (!name) return;
      scrollToPage(name, arrow.classList.contains('right') ? 1 : -1);
    });
  }

  if (tracks.length > 0) {
    scope.listenWindow('resize', () => {
      for (const track of tracks) refreshEdgeState(track);
    });
  }

  for (const track of tracks) refreshEdgeState(track);

  return {
    scrollToPage,
    refreshEdgeState,
    destroy: scope.dispose,
  };
}
