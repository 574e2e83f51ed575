/**
 * Event Normalization - Module Exports
 *
 * CloudTrail creation event → CreationFact.
 */

export { EventNormalizer, createEventNormalizer } from './normalizer.js';

export { resolveActorIdentity, rootAccountArn } from './actor-identity.js';

export {
  EVENT_SCHEMAS,
  getEventSchema,
  isSupportedEvent,
  getSupportedEvents,
} from './event-schemas.js';

export { classify, step, navigate, collectIds } from './path-navigator.js';

export type {
  PathSegment,
  EventSchema,
  EventSchemaTable,
  StructuredValue,
  IEventNormalizer,
} from './types.js';
