import { EntityLinkParts } from './types.js';

/**
 * Entity link grammar:
 *
 *   <#E/{entityType}/{entityFQN}>
 *   <#E/{entityType}/{entityFQN}/{fieldName}>
 *   <#E/{entityType}/{entityFQN}/{fieldName}/{arrayFieldName}>
 *   <#E/{entityType}/{entityFQN}/{fieldName}/{arrayFieldName}/{arrayFieldValue}>
 *
 * e.g. <#E/table/bigquery_gcp.shopify.raw_product_catalog/columns/comment/description>
 *
 * A link may carry fallback display text for clients that cannot resolve it:
 *   <#E/user/user1|[@User One](http://localhost:8585/user/user1)>
 */

export const OPEN_TOKEN = '<#E/';
export const CLOSE_TOKEN = '>';
export const SEGMENT_SEPARATOR = '/';
export const FALLBACK_SEPARATOR = '|';

/** entityType, entityFQN, fieldName, arrayFieldName, arrayFieldValue */
export const MAX_SEGMENTS = 5;

// Open token, anything but angle brackets, then the first '>'
const CANDIDATE_SOURCE = '<#E/[^<>]+>';

/**
 * A substring of the input delimited by the open and close tokens
 */
export interface Candidate {
  /** The raw token, delimiters included */
  raw: string;
  /** Offset of the open token in the scanned text */
  index: number;
}

/**
 * Scan text left to right for non-overlapping candidate tokens.
 * Each call scans with its own pattern instance.
 */
export function* findCandidates(text: string): Generator<Candidate> {
  const pattern = new RegExp(CANDIDATE_SOURCE, 'g');
  for (const match of text.matchAll(pattern)) {
    yield { raw: match[0], index: match.index ?? 0 };
  }
}

/**
 * Replace every candidate token in text.
 */
export function replaceCandidates(text: string, replacer: (raw: string) => string): string {
  return text.replace(new RegExp(CANDIDATE_SOURCE, 'g'), replacer);
}

/**
 * Drop fallback display text: everything from the first '|' is removed
 * and the close token re-appended.
 */
export function stripFallbackText(text: string): string {
  const at = text.indexOf(FALLBACK_SEPARATOR);
  if (at === -1) {
    return text;
  }
  return text.slice(0, at) + CLOSE_TOKEN;
}

/**
 * The text between the open and close tokens of a candidate
 */
export function candidateBody(raw: string): string {
  return raw.slice(OPEN_TOKEN.length, raw.length - CLOSE_TOKEN.length);
}

/**
 * Split a link body into at most MAX_SEGMENTS positional tokens.
 * The last token keeps whatever remains, separators included.
 * Trailing empty tokens are dropped.
 */
export function splitSegments(body: string): string[] {
  const tokens: string[] = [];
  let rest = body;

  while (tokens.length < MAX_SEGMENTS - 1) {
    const at = rest.indexOf(SEGMENT_SEPARATOR);
    if (at === -1) {
      break;
    }
    tokens.push(rest.slice(0, at));
    rest = rest.slice(at + SEGMENT_SEPARATOR.length);
  }
  tokens.push(rest);

  while (tokens.length > 0 && tokens[tokens.length - 1] === '') {
    tokens.pop();
  }
  return tokens;
}

/**
 * Assign positional tokens to link segments. Empty tokens are absent.
 */
export function segmentsToParts(tokens: string[]): EntityLinkParts {
  const [entityType = '', entityFQN = '', fieldName, arrayFieldName, arrayFieldValue] = tokens;
  const parts: EntityLinkParts = { entityType, entityFQN };

  if (fieldName) {
    parts.fieldName = fieldName;
  }
  if (arrayFieldName) {
    parts.arrayFieldName = arrayFieldName;
  }
  if (arrayFieldValue) {
    parts.arrayFieldValue = arrayFieldValue;
  }
  return parts;
}
