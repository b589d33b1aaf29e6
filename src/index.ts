export type {
  LinkKind,
  EntityLinkParts,
  EntityLink,
  EntityOnlyLink,
  FieldLink,
  ArrayFieldLink,
  FeedPost,
  FeedThread
} from './types.js';
export {
  EntityLinkError,
  MalformedAddressError,
  AmbiguousAddressError,
  InvalidSegmentOrderError,
  FeedError
} from './errors.js';
export {
  OPEN_TOKEN,
  CLOSE_TOKEN,
  SEGMENT_SEPARATOR,
  FALLBACK_SEPARATOR,
  MAX_SEGMENTS,
  stripFallbackText,
  splitSegments
} from './grammar.js';
export { createEntityLink, entityLinkEquals, isSameEntity, describeEntityLink, linkParts } from './link.js';
export {
  parseEntityLink,
  scanEntityLinks,
  extractEntityLinks,
  renderEntityLink,
  canonicalizeLinks
} from './codec.js';
export type { RenderLinkOptions, CanonicalizeResult } from './codec.js';
export { FeedStore } from './feed.js';
export { createApp } from './app.js';
