/**
 * What an entity link points at.
 * - ENTITY: the entity itself
 * - FIELD: a named field of the entity
 * - ARRAY_FIELD: a member (or a value of a member) inside an array-valued field
 */
export type LinkKind = 'ENTITY' | 'FIELD' | 'ARRAY_FIELD';

/**
 * The segments an entity link is assembled from.
 */
export interface EntityLinkParts {
  /** Catalog-defined kind of object, e.g. "table" */
  entityType: string;

  /** Fully-qualified name of the referenced entity */
  entityFQN: string;

  fieldName?: string;

  /** Member of the array field named by fieldName */
  arrayFieldName?: string;

  /** Value within the array member */
  arrayFieldValue?: string;
}

interface LinkBase {
  readonly entityType: string;
  readonly entityFQN: string;

  /** Shape of what is referenced, e.g. "table.columns.member" */
  readonly qualifiedType: string;

  /** Concrete referenced path, e.g. "db.orders.customer_id" */
  readonly qualifiedValue: string;
}

export interface EntityOnlyLink extends LinkBase {
  readonly kind: 'ENTITY';
}

export interface FieldLink extends LinkBase {
  readonly kind: 'FIELD';
  readonly fieldName: string;
}

export interface ArrayFieldLink extends LinkBase {
  readonly kind: 'ARRAY_FIELD';
  readonly fieldName: string;
  readonly arrayFieldName: string;
  readonly arrayFieldValue?: string;
}

/**
 * A parsed or assembled reference to an entity, one of its fields,
 * or an element inside one of its array fields.
 */
export type EntityLink = EntityOnlyLink | FieldLink | ArrayFieldLink;

/**
 * A single message inside a conversation thread.
 */
export interface FeedPost {
  id: string;

  /** Author of the post */
  from: string;

  /** Raw message text, may embed entity links */
  message: string;

  /** ISO timestamp */
  postedAt: string;

  /** Entity links found in the message, in order of appearance */
  mentions: EntityLink[];
}

/**
 * A conversation about an entity or one of its fields.
 */
export interface FeedThread {
  id: string;

  /** What the thread is about */
  about: EntityLink;

  createdBy: string;

  /** ISO timestamp */
  createdAt: string;

  /** Opening message first */
  posts: FeedPost[];
}
