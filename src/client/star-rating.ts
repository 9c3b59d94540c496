/**
 * Star rating widget over a native radio group.
 *
 * Each label is bound to one radio input (via its `for` attribute, or the
 * input right before it). Labels up to the checked value get `filled`;
 * hovering a label marks a `preview` fill without touching the selection.
 * The group is one tab stop and handles arrow keys, Home and End itself.
 */
import { createScope } from './scope.js';
import type { ComponentHandle, RatingState } from './types.js';

export const GROUP_SELECTOR = '.rating-stars';
const INPUT_SELECTOR = 'input[type="radio"]';

/** Slack for half-step values compared as floats */
export const RATING_EPSILON = 0.0001;

export interface RatingEntry {
  value: number;
  input: HTMLInputElement;
  label: HTMLLabelElement;
}

export interface StarRatingHandle extends ComponentHandle {
  update: () => void;
  /** Checked value, 0 when unrated */
  value: () => number;
}

export function isFilled(entryValue: number, selected: number | null): boolean {
  if (selected === null || Number.isNaN(entryValue)) return false;
  return entryValue <= selected + RATING_EPSILON;
}

export type RatingKey = 'ArrowRight' | 'ArrowUp' | 'ArrowLeft' | 'ArrowDown' | 'Home' | 'End';

const RATING_KEYS: ReadonlySet<string> = new Set<RatingKey>(['ArrowRight', 'ArrowUp', 'ArrowLeft', 'ArrowDown', 'Home', 'End']);

export function isRatingKey(key: string): key is RatingKey {
  return RATING_KEYS.has(key);
}

/**
 * Index to select after a key press, over entries sorted by value.
 * `current` is -1 when nothing is checked. Clamps at both ends.
 */
export function nextRatingIndex(key: RatingKey, current: number, count: number): number {
  switch (key) {
    case 'ArrowRight':
    case 'ArrowUp':
      return Math.min(count - 1, current + 1);
    case 'ArrowLeft':
    case 'ArrowDown':
      return Math.max(0, current - 1);
    case 'Home':
      return 0;
    case 'End':
      return count - 1;
  }
}

export function renderRating(entries: readonly RatingEntry[], state: RatingState): void {
  for (const { label, value } of entries) {
    label.classList.toggle('filled', isFilled(value, state.selected));
    label.classList.toggle('preview', isFilled(value, state.preview));
  }
}

function inputForLabel(group: HTMLElement, label: HTMLLabelElement): HTMLInputElement | null {
  const forId = label.htmlFor;
  if (forId) {
    for (const input of group.querySelectorAll<HTMLInputElement>(INPUT_SELECTOR)) {
      if (input.id === forId) return input;
    }
    return null;
  }
  const prev = label.previousElementSibling;
  return prev instanceof HTMLInputElement && prev.type === 'radio' ? prev : null;
}

/** Pair labels with inputs; entries keep DOM order. */
export function readRatingEntries(group: HTMLElement): RatingEntry[] {
  const entries: RatingEntry[] = [];
  for (const label of group.querySelectorAll('label')) {
    const input = inputForLabel(group, label);
    if (!input) continue;
    entries.push({ value: parseFloat(input.value), input, label });
  }
  return entries;
}

export function createStarRating(group: HTMLElement): StarRatingHandle {
  const scope = createScope();
  const entries = readRatingEntries(group);
  const inputs = Array.from(group.querySelectorAll<HTMLInputElement>(INPUT_SELECTOR));
  // Keyboard order follows value, not DOM order (row-reverse star markup is common)
  const ordered = entries
    .filter(e => !Number.isNaN(e.value))
    .sort((a, b) => a.value - b.value);

  const state: RatingState = { selected: null, preview: null };

  function readSelected(): number | null {
    const checked = inputs.find(i => i.checked);
    if (!checked) return null;
    const value = parseFloat(checked.value);
    return Number.isNaN(value) ? null : value;
  }

  function update(): void {
    state.selected = readSelected();
    renderRating(entries, state);
  }

  for (const input of inputs) {
    scope.listen(input, 'change', update);
    input.tabIndex = -1;
  }

  for (const entry of entries) {
    scope.listen(entry.label, 'mouseenter', () => {
      state.preview = Number.isNaN(entry.value) ? null : entry.value;
      renderRating(entries, state);
    });
    scope.listen(entry.label, 'mouseleave', () => {
      state.preview = null;
      renderRating(entries, state);
    });
  }

  group.setAttribute('role', 'radiogroup');
  group.tabIndex = 0;

  scope.listen(group, 'keydown', (e) => {
    if (!isRatingKey(e.key) || ordered.length === 0) return;
    const current = ordered.findIndex(entry => entry.input.checked);
    const next = nextRatingIndex(e.key, current, ordered.length);
    if (next === current) return;

    e.preventDefault();
    const target = ordered[next].input;
    // Inputs are not guaranteed to share a name
    for (const input of inputs) input.checked = input === target;
    target.dispatchEvent(new Event('change', { bubbles: true }));
  });

  update();

  return {
    update,
    value: () => state.selected ?? 0,
    destroy: scope.dispose,
  };
}
