/**
 * Pipeline - Module Exports
 */

export {
  TaggingPipeline,
  createTaggingPipeline,
  additionalTagsFor,
  SERVICE_NAME,
  SERVICE_VERSION,
  SINGLE_EVENT_MESSAGE,
  BATCH_MESSAGE,
  UNRECOGNIZED_TRIGGER_MESSAGE,
  UNSUPPORTED_EVENT_MESSAGE,
  INTERNAL_ERROR_MESSAGE,
  type TaggingPipelineOptions,
  type HealthStatus,
} from './tagging-pipeline.js';

export { detectTrigger, isTriggerEnabled, type DetectedTrigger } from './trigger.js';

export { handler, createHandler, type LambdaHandler } from './handler.js';
