import { EntityLink } from './types.js';
import { AmbiguousAddressError, EntityLinkError, MalformedAddressError } from './errors.js';
import {
  CLOSE_TOKEN,
  FALLBACK_SEPARATOR,
  OPEN_TOKEN,
  SEGMENT_SEPARATOR,
  candidateBody,
  findCandidates,
  replaceCandidates,
  segmentsToParts,
  splitSegments,
  stripFallbackText
} from './grammar.js';
import { createEntityLink } from './link.js';

/**
 * Options for rendering a link
 */
export interface RenderLinkOptions {
  /** Display text for clients that cannot resolve the link, e.g. "[@User One](http://host/user/user1)" */
  fallbackText?: string;
}

/**
 * Result of rewriting the links in a text
 */
export interface CanonicalizeResult {
  text: string;
  /** Number of links whose text changed */
  replaced: number;
}

/**
 * Parse one isolated candidate token.
 * Returns null when entityType or entityFQN is missing, or when a
 * segment before the last one is empty.
 */
function parseCandidate(raw: string): EntityLink | null {
  // Trailing empty tokens are already dropped, so any empty token left is interior
  const tokens = splitSegments(candidateBody(stripFallbackText(raw)));
  if (tokens.includes('')) {
    return null;
  }
  const parts = segmentsToParts(tokens);
  if (!parts.entityType || !parts.entityFQN) {
    return null;
  }
  return createEntityLink(parts);
}

function* generateLinks(text: string): Generator<EntityLink> {
  for (const candidate of findCandidates(text)) {
    const link = parseCandidate(candidate.raw);
    if (link) {
      yield link;
    }
  }
}

/**
 * Parse text that must hold exactly one entity link.
 * Fallback display text is dropped from the first '|' onwards before matching.
 *
 * @throws MalformedAddressError when no link is found
 * @throws AmbiguousAddressError when more than one link is found
 */
export function parseEntityLink(text: string): EntityLink {
  const source = stripFallbackText(text);
  let found: EntityLink | null = null;

  for (const link of generateLinks(source)) {
    if (found) {
      throw new AmbiguousAddressError(`Unexpected multiple entity links in ${source}`);
    }
    found = link;
  }

  if (!found) {
    throw new MalformedAddressError(`Entity link was not found in ${source}`);
  }
  return found;
}

/**
 * Lazily find every entity link in free-form text, left to right.
 * Iterating again restarts the scan. Tokens without both entityType and
 * entityFQN, or with an empty segment in the middle, are skipped.
 */
export function scanEntityLinks(text: string): Iterable<EntityLink> {
  return {
    [Symbol.iterator]: () => generateLinks(text)
  };
}

/**
 * Find every entity link in free-form text, left to right.
 */
export function extractEntityLinks(text: string): EntityLink[] {
  return Array.from(generateLinks(text));
}

/**
 * Render a link in canonical form. The kind decides how many segments are written.
 */
export function renderEntityLink(link: EntityLink, options: RenderLinkOptions = {}): string {
  const segments = [link.entityType, link.entityFQN];

  if (link.kind === 'FIELD' || link.kind === 'ARRAY_FIELD') {
    segments.push(link.fieldName);
  }
  if (link.kind === 'ARRAY_FIELD') {
    segments.push(link.arrayFieldName);
    if (link.arrayFieldValue) {
      segments.push(link.arrayFieldValue);
    }
  }

  let rendered = OPEN_TOKEN + segments.join(SEGMENT_SEPARATOR);
  if (options.fallbackText !== undefined) {
    if (/[<>]/.test(options.fallbackText)) {
      throw new EntityLinkError(`Fallback text must not contain '<' or '>': ${options.fallbackText}`);
    }
    rendered += FALLBACK_SEPARATOR + options.fallbackText;
  }
  return rendered + CLOSE_TOKEN;
}

/**
 * Rewrite every entity link in text to its canonical form,
 * dropping fallback display text.
 */
export function canonicalizeLinks(text: string): CanonicalizeResult {
  let replaced = 0;
  const rewritten = replaceCandidates(text, raw => {
    const link = parseCandidate(raw);
    if (!link) {
      return raw;
    }
    const canonical = renderEntityLink(link);
    if (canonical !== raw) {
      replaced++;
    }
    return canonical;
  });
  return { text: rewritten, replaced };
}
