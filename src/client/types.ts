/** Widget state, rendered into existing server markup */

/** Returned by every widget constructor; tears down listeners and timers. */
export interface ComponentHandle {
  destroy: () => void;
}

/** Paging direction for a carousel track */
export type ScrollDirection = -1 | 1;

export interface TrackMetrics {
  scrollLeft: number;
  scrollWidth: number;
  clientWidth: number;
}

export interface EdgeState {
  atStart: boolean;
  atEnd: boolean;
}

export interface PromoState {
  index: number;
  count: number;
}

export interface RatingState {
  /** Checked value, or null when the group is unrated */
  selected: number | null;
  /** Value under the pointer, or null when not hovering */
  preview: number | null;
}

export type UserVote = 'up' | 'down';

export interface VoteState {
  yes?: string;
  no?: string;
  userVote: UserVote | null;
}
