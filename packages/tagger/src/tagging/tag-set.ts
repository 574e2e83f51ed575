import type { TagSet } from '@auto-tagger/contracts';

export const MANAGED_BY_VALUE = 'auto-tagger';

/**
 * Build the tag set written to every resource of a fact.
 *
 * Defaults first, then `additionalTags` layered on top; a colliding key in
 * `additionalTags` wins.
 */
export function buildTagSet(actorIdentity: string, additionalTags: TagSet = {}, now: Date = new Date()): TagSet {
  return {
    CreatedBy: actorIdentity,
    CreatedDate: now.toISOString(),
    ManagedBy: MANAGED_BY_VALUE,
    ...additionalTags,
  };
}

export interface KeyValueTag {
  Key: string;
  Value: string;
}

/**
 * `[{ Key, Value }]` shape used by EC2, S3, RDS, DynamoDB and SNS
 */
export function toKeyValueTags(tags: TagSet): KeyValueTag[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}
