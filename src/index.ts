export { mountStorefront, readPromoOptions } from './client/mount.js';
export {
  createCarousel,
  computeEdgeState,
  readTrackMetrics,
  renderEdgeState,
  type CarouselHandle,
  type CarouselOptions,
} from './client/carousel.js';
export {
  createPromoRotator,
  normalizeIndex,
  renderSlides,
  type PromoRotatorHandle,
  type PromoRotatorOptions,
} from './client/promo.js';
export {
  createStarRating,
  isFilled,
  nextRatingIndex,
  readRatingEntries,
  renderRating,
  type RatingEntry,
  type StarRatingHandle,
} from './client/star-rating.js';
export { createVoteClient, renderVoteState, toVoteState, type VoteClientOptions } from './client/vote.js';
export { submitVote, readCookie, VoteRequestError, type VoteResponse } from './client/api.js';
export { createMediaGallery } from './client/gallery.js';
export type {
  ComponentHandle,
  EdgeState,
  PromoState,
  RatingState,
  ScrollDirection,
  TrackMetrics,
  UserVote,
  VoteState,
} from './client/types.js';
