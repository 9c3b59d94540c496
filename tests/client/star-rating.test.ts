import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createStarRating,
  isFilled,
  nextRatingIndex,
  type StarRatingHandle,
} from '../../src/client/star-rating.js';

function buildGroup(values: number[], checked: number | null = null): HTMLElement {
  const pairs = values.map((v, i) => {
    const id = `star-${i}`;
    const isChecked = v === checked ? ' checked' : '';
    return `<input type="radio" name="rating" id="${id}" value="${v}"${isChecked}><label for="${id}">★</label>`;
  }).join('');
  document.body.innerHTML = `<div class="rating-stars">${pairs}</div>`;
  return document.querySelector<HTMLElement>('.rating-stars')!;
}

function filledValues(group: HTMLElement, cls = 'filled'): string[] {
  return Array.from(group.querySelectorAll('label'))
    .filter(l => l.classList.contains(cls))
    .map(l => group.querySelector<HTMLInputElement>(`#${l.htmlFor}`)!.value);
}

function press(group: HTMLElement, key: string): KeyboardEvent {
  const event = new KeyboardEvent('keydown', { key, bubbles: true, cancelable: true });
  group.dispatchEvent(event);
  return event;
}

function checkedValue(group: HTMLElement): string | null {
  const checked = Array.from(group.querySelectorAll('input')).filter(i => i.checked);
  expect(checked.length).toBeLessThanOrEqual(1);
  return checked[0]?.value ?? null;
}

describe('isFilled', () => {
  it('fills values up to and including the selection', () => {
    expect(isFilled(3, 3)).toBe(true);
    expect(isFilled(2, 3)).toBe(true);
    expect(isFilled(3.5, 3)).toBe(false);
  });

  it('tolerates float error within the epsilon', () => {
    expect(isFilled(3, 2.99995)).toBe(true);
    expect(isFilled(3, 2.999)).toBe(false);
  });

  it('fills nothing when unrated', () => {
    expect(isFilled(1, null)).toBe(false);
  });

  it('never fills an unparsable value', () => {
    expect(isFilled(NaN, 5)).toBe(false);
  });
});

describe('nextRatingIndex', () => {
  it('moves up and down with clamping', () => {
    expect(nextRatingIndex('ArrowRight', 1, 5)).toBe(2);
    expect(nextRatingIndex('ArrowUp', 4, 5)).toBe(4);
    expect(nextRatingIndex('ArrowLeft', 2, 5)).toBe(1);
    expect(nextRatingIndex('ArrowDown', 0, 5)).toBe(0);
  });

  it('jumps to either end', () => {
    expect(nextRatingIndex('Home', 3, 5)).toBe(0);
    expect(nextRatingIndex('End', 1, 5)).toBe(4);
  });

  it('selects the minimum from the unrated state', () => {
    expect(nextRatingIndex('ArrowRight', -1, 5)).toBe(0);
    expect(nextRatingIndex('ArrowDown', -1, 5)).toBe(0);
  });
});

describe('createStarRating', () => {
  let rating: StarRatingHandle | null;

  beforeEach(() => {
    rating = null;
  });

  afterEach(() => {
    rating?.destroy();
  });

  it('fills nothing when unchecked', () => {
    const group = buildGroup([1, 2, 3, 4, 5]);
    rating = createStarRating(group);

    expect(filledValues(group)).toEqual([]);
    expect(rating.value()).toBe(0);
  });

  it('fills up to the initially checked value', () => {
    const group = buildGroup([1, 2, 3, 4, 5], 3);
    rating = createStarRating(group);

    expect(filledValues(group)).toEqual(['1', '2', '3']);
    expect(rating.value()).toBe(3);
  });

  it('re-renders on change', () => {
    const group = buildGroup([1, 2, 3, 4, 5], 1);
    rating = createStarRating(group);

    const four = group.querySelector<HTMLInputElement>('input[value="4"]')!;
    for (const input of group.querySelectorAll('input')) input.checked = input === four;
    four.dispatchEvent(new Event('change', { bubbles: true }));

    expect(filledValues(group)).toEqual(['1', '2', '3', '4']);
  });

  it('handles half steps', () => {
    const group = buildGroup([0.5, 1, 1.5, 2, 2.5, 3], 2.5);
    rating = createStarRating(group);

    expect(filledValues(group)).toEqual(['0.5', '1', '1.5', '2', '2.5']);
  });

  it('binds a label without a for attribute to the preceding input', () => {
    document.body.innerHTML = `
      <div class="rating-stars">
        <input type="radio" name="rating" value="1"><label>★</label>
        <input type="radio" name="rating" value="2" checked><label>★</label>
        <input type="radio" name="rating" value="3"><label>★</label>
      </div>`;
    const group = document.querySelector<HTMLElement>('.rating-stars')!;
    rating = createStarRating(group);

    const labels = Array.from(group.querySelectorAll('label'));
    expect(labels.map(l => l.classList.contains('filled'))).toEqual([true, true, false]);
  });

  it('previews on hover without changing the selection', () => {
    const group = buildGroup([1, 2, 3, 4, 5], 2);
    rating = createStarRating(group);
    const fourth = group.querySelectorAll('label')[3];

    fourth.dispatchEvent(new Event('mouseenter'));

    expect(filledValues(group, 'preview')).toEqual(['1', '2', '3', '4']);
    expect(filledValues(group)).toEqual(['1', '2']);
    expect(checkedValue(group)).toBe('2');

    fourth.dispatchEvent(new Event('mouseleave'));

    expect(filledValues(group, 'preview')).toEqual([]);
    expect(filledValues(group)).toEqual(['1', '2']);
  });

  it('is a single tab stop with radiogroup semantics', () => {
    const group = buildGroup([1, 2, 3]);
    rating = createStarRating(group);

    expect(group.getAttribute('role')).toBe('radiogroup');
    expect(group.tabIndex).toBe(0);
    for (const input of group.querySelectorAll('input')) {
      expect(input.tabIndex).toBe(-1);
    }
  });

  describe('keyboard', () => {
    it('End, Home, then Right three times lands on the fourth entry', () => {
      const group = buildGroup([1, 2, 3, 4, 5]);
      rating = createStarRating(group);

      press(group, 'End');
      expect(checkedValue(group)).toBe('5');
      press(group, 'Home');
      expect(checkedValue(group)).toBe('1');
      press(group, 'ArrowRight');
      press(group, 'ArrowRight');
      press(group, 'ArrowRight');

      expect(checkedValue(group)).toBe('4');
      expect(rating.value()).toBe(4);
      expect(filledValues(group)).toEqual(['1', '2', '3', '4']);
    });

    it('Home then Right twice lands on the third entry', () => {
      const group = buildGroup([1, 2, 3, 4, 5]);
      rating = createStarRating(group);

      press(group, 'Home');
      press(group, 'ArrowRight');
      press(group, 'ArrowRight');

      expect(checkedValue(group)).toBe('3');
    });

    it('Left and Down move to lower values', () => {
      const group = buildGroup([1, 2, 3, 4, 5], 4);
      rating = createStarRating(group);

      press(group, 'ArrowLeft');
      expect(checkedValue(group)).toBe('3');
      press(group, 'ArrowDown');
      expect(checkedValue(group)).toBe('2');
    });

    it('clamps at the top without wrapping', () => {
      const group = buildGroup([1, 2, 3, 4, 5], 5);
      rating = createStarRating(group);

      const event = press(group, 'ArrowUp');

      expect(checkedValue(group)).toBe('5');
      expect(event.defaultPrevented).toBe(false);
    });

    it('clamps at the bottom without wrapping', () => {
      const group = buildGroup([1, 2, 3, 4, 5], 1);
      rating = createStarRating(group);

      press(group, 'ArrowLeft');

      expect(checkedValue(group)).toBe('1');
    });

    it('consumes handled keys and ignores others', () => {
      const group = buildGroup([1, 2, 3]);
      rating = createStarRating(group);

      expect(press(group, 'End').defaultPrevented).toBe(true);
      expect(press(group, 'Tab').defaultPrevented).toBe(false);
      expect(checkedValue(group)).toBe('3');
    });

    it('fires the same change event a click would', () => {
      const group = buildGroup([1, 2, 3]);
      rating = createStarRating(group);
      const onChange = vi.fn();
      group.addEventListener('change', onChange);

      press(group, 'ArrowRight');
      press(group, 'ArrowRight');

      expect(onChange).toHaveBeenCalledTimes(2);
      expect(onChange.mock.calls[1][0].target).toBe(group.querySelector('input[value="2"]'));
    });

    it('follows value order when the markup is reversed', () => {
      const group = buildGroup([5, 4, 3, 2, 1]);
      rating = createStarRating(group);

      press(group, 'ArrowRight');
      expect(checkedValue(group)).toBe('1');
      press(group, 'ArrowRight');
      expect(checkedValue(group)).toBe('2');
      press(group, 'End');
      expect(checkedValue(group)).toBe('5');
    });

    it('stops handling keys after destroy', () => {
      const group = buildGroup([1, 2, 3]);
      rating = createStarRating(group);
      rating.destroy();

      press(group, 'End');

      expect(checkedValue(group)).toBeNull();
    });
  });
});
