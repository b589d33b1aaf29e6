export class EntityLinkError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'EntityLinkError';
  }
}

/** No well-formed link in the input, or entityType / entityFQN missing. */
export class MalformedAddressError extends EntityLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedAddressError';
  }
}

/** A strict parse found more than one link. */
export class AmbiguousAddressError extends EntityLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'AmbiguousAddressError';
  }
}

/** An array segment given without the segment it belongs to. */
export class InvalidSegmentOrderError extends EntityLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSegmentOrderError';
  }
}

export class FeedError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'FeedError';
  }
}
