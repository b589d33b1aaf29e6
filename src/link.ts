import { ArrayFieldLink, EntityLink, EntityLinkParts, EntityOnlyLink, FieldLink } from './types.js';
import { InvalidSegmentOrderError, MalformedAddressError } from './errors.js';
import { CLOSE_TOKEN, FALLBACK_SEPARATOR, SEGMENT_SEPARATOR } from './grammar.js';

const RESERVED = ['<', CLOSE_TOKEN, FALLBACK_SEPARATOR];

type SegmentName = keyof EntityLinkParts;

function checkSegment(name: SegmentName, value: string, allowSeparator: boolean): void {
  for (const ch of RESERVED) {
    if (value.includes(ch)) {
      throw new MalformedAddressError(`Entity link segment {${name}} must not contain '${ch}': ${value}`);
    }
  }
  if (!allowSeparator && value.includes(SEGMENT_SEPARATOR)) {
    throw new MalformedAddressError(`Entity link segment {${name}} must not contain '/': ${value}`);
  }
}

/**
 * Build an entity link from its segments.
 * Empty optional segments count as absent. The kind and the qualified
 * type/value are derived from which segments are present.
 */
export function createEntityLink(parts: EntityLinkParts): EntityLink {
  const { entityType, entityFQN } = parts;
  const fieldName = parts.fieldName || undefined;
  const arrayFieldName = parts.arrayFieldName || undefined;
  const arrayFieldValue = parts.arrayFieldValue || undefined;

  if (!entityType || !entityFQN) {
    throw new MalformedAddressError('Entity link must have both {entityType} and {entityFQN}');
  }
  checkSegment('entityType', entityType, false);
  checkSegment('entityFQN', entityFQN, false);

  if (arrayFieldValue !== undefined && arrayFieldName === undefined) {
    throw new InvalidSegmentOrderError(
      `Entity link has {arrayFieldValue} "${arrayFieldValue}" without {arrayFieldName}`
    );
  }
  if (arrayFieldName !== undefined && fieldName === undefined) {
    throw new InvalidSegmentOrderError(
      `Entity link has {arrayFieldName} "${arrayFieldName}" without {fieldName}`
    );
  }

  if (fieldName === undefined) {
    return Object.freeze<EntityOnlyLink>({
      kind: 'ENTITY',
      entityType,
      entityFQN,
      qualifiedType: entityType,
      qualifiedValue: entityFQN
    });
  }
  checkSegment('fieldName', fieldName, false);

  if (arrayFieldName === undefined) {
    return Object.freeze<FieldLink>({
      kind: 'FIELD',
      entityType,
      entityFQN,
      fieldName,
      qualifiedType: `${entityType}.${fieldName}`,
      qualifiedValue: `${entityFQN}.${fieldName}`
    });
  }
  checkSegment('arrayFieldName', arrayFieldName, false);

  const qualifiedType = `${entityType}.${fieldName}.member`;
  if (arrayFieldValue === undefined) {
    return Object.freeze<ArrayFieldLink>({
      kind: 'ARRAY_FIELD',
      entityType,
      entityFQN,
      fieldName,
      arrayFieldName,
      qualifiedType,
      qualifiedValue: `${entityFQN}.${arrayFieldName}`
    });
  }
  // Last positional segment, so '/' is allowed here
  checkSegment('arrayFieldValue', arrayFieldValue, true);

  return Object.freeze<ArrayFieldLink>({
    kind: 'ARRAY_FIELD',
    entityType,
    entityFQN,
    fieldName,
    arrayFieldName,
    arrayFieldValue,
    qualifiedType,
    qualifiedValue: `${entityFQN}.${arrayFieldName}.${arrayFieldValue}`
  });
}

/**
 * The segments of a link, absent ones omitted
 */
export function linkParts(link: EntityLink): EntityLinkParts {
  switch (link.kind) {
    case 'ENTITY':
      return { entityType: link.entityType, entityFQN: link.entityFQN };
    case 'FIELD':
      return { entityType: link.entityType, entityFQN: link.entityFQN, fieldName: link.fieldName };
    case 'ARRAY_FIELD': {
      const parts: EntityLinkParts = {
        entityType: link.entityType,
        entityFQN: link.entityFQN,
        fieldName: link.fieldName,
        arrayFieldName: link.arrayFieldName
      };
      if (link.arrayFieldValue !== undefined) {
        parts.arrayFieldValue = link.arrayFieldValue;
      }
      return parts;
    }
  }
}

/**
 * Structural equality: kind and all five segments
 */
export function entityLinkEquals(a: EntityLink, b: EntityLink): boolean {
  const left = linkParts(a);
  const right = linkParts(b);
  return a.kind === b.kind
    && left.entityType === right.entityType
    && left.entityFQN === right.entityFQN
    && left.fieldName === right.fieldName
    && left.arrayFieldName === right.arrayFieldName
    && left.arrayFieldValue === right.arrayFieldValue;
}

/**
 * True when both links name the same entity, whatever field they target
 */
export function isSameEntity(a: EntityLink, b: EntityLink): boolean {
  return a.entityType === b.entityType && a.entityFQN === b.entityFQN;
}

export function describeEntityLink(link: EntityLink): string {
  const parts = linkParts(link);
  return `EntityLink { kind = ${link.kind}, entityType = ${parts.entityType}, entityFQN = ${parts.entityFQN}, `
    + `fieldName = ${parts.fieldName}, arrayFieldName = ${parts.arrayFieldName}, arrayFieldValue = ${parts.arrayFieldValue} }`;
}
