/**
 * Latest-wins guard for overlapping async work on one target.
 *
 * Each action takes a token; when its completion runs it checks whether a
 * newer token was issued in the meantime and drops itself if so.
 */
export interface LatestGuard {
  next: () => number;
  isLatest: (token: number) => boolean;
  /** Invalidate every token issued so far */
  invalidate: () => void;
}

export function createLatestGuard(): LatestGuard {
  let latest = 0;
  return {
    next: () => ++latest,
    isLatest: (token) => token === latest,
    invalidate: () => {
      latest++;
    },
  };
}
