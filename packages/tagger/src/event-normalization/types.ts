/**
 * Event Normalization - Type Definitions
 *
 * Types for turning CloudTrail creation events into canonical creation facts.
 */

import type { CreationEventName, CreationFact, SupportedService } from '@auto-tagger/contracts';

/**
 * A step into a nested value: a field name for maps, an index for sequences.
 */
export type PathSegment = string | number;

/**
 * Where to find resource ids in a creation event, and what kind of
 * resource they identify.
 */
export interface EventSchema {
  readonly service: SupportedService;
  readonly resourceKind: string;
  /** Path from the event detail to the id value */
  readonly idPath: readonly [PathSegment, ...PathSegment[]];
  /** Field to read from each element when the path ends at a sequence of maps */
  readonly idKey?: string;
}

export type EventSchemaTable = ReadonlyMap<CreationEventName, EventSchema>;

/**
 * Structural view of an arbitrary decoded JSON value.
 */
export type StructuredValue =
  | { readonly kind: 'map'; readonly fields: Readonly<Record<string, unknown>> }
  | { readonly kind: 'sequence'; readonly items: readonly unknown[] }
  | { readonly kind: 'scalar'; readonly value: string | number | boolean }
  | { readonly kind: 'absent' };

/**
 * Normalizer interface
 */
export interface IEventNormalizer {
  /** Returns undefined for unsupported or unparseable events */
  normalize(rawEvent: unknown): CreationFact | undefined;
}
