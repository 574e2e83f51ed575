/**
 * @auto-tagger/contracts
 *
 * Zod schemas and TypeScript types shared by the tagging pipeline:
 * CloudTrail records, creation facts, tag sets, outcomes and trigger payloads.
 *
 * @packageDocumentation
 */

// CloudTrail records and envelopes
export {
  CreationEventNameSchema,
  UserIdentitySchema,
  CloudTrailRecordSchema,
  CloudTrailLogFileSchema,
  RawEventSchema,
  isCreationEventName,
  type CreationEventName,
  type UserIdentity,
  type CloudTrailRecord,
  type CloudTrailLogFile,
  type RawEvent,
} from './schemas/cloudtrail-events.js';

// Creation facts
export {
  SupportedServiceSchema,
  CreationFactSchema,
  isSupportedService,
  type SupportedService,
  type CreationFact,
} from './types/creation-fact.js';

// Tagging
export {
  TagSetSchema,
  TaggingFailureSchema,
  TaggingOutcomeSchema,
  emptyOutcome,
  mergeOutcomes,
  type TagSet,
  type TaggingFailure,
  type TaggingOutcome,
} from './types/tagging.js';

// Triggers and responses
export {
  S3NotificationRecordSchema,
  BatchTriggerSchema,
  SingleEventTriggerSchema,
  TriggerModeSchema,
  FailedResourceSchema,
  SingleEventSummarySchema,
  BatchSummarySchema,
  ErrorSummarySchema,
  PipelineResponseSchema,
  type S3NotificationRecord,
  type BatchTrigger,
  type SingleEventTrigger,
  type TriggerMode,
  type LogObjectRef,
  type FailedResource,
  type SingleEventSummary,
  type BatchSummary,
  type ErrorSummary,
  type PipelineResponse,
} from './types/trigger.js';
