import { z } from 'zod';

/**
 * One entry of an S3 event notification. Only bucket name and object key
 * are needed to locate a delivered CloudTrail log file.
 */
export const S3NotificationRecordSchema = z.object({
  eventName: z.string().optional(),
  awsRegion: z.string().optional(),
  s3: z.object({
    bucket: z.object({ name: z.string().min(1) }).passthrough(),
    object: z.object({
      key: z.string().min(1).describe('URL-encoded object key'),
      size: z.number().optional(),
    }).passthrough(),
  }).passthrough(),
}).passthrough();

export type S3NotificationRecord = z.infer<typeof S3NotificationRecordSchema>;

/**
 * Batch trigger: an S3 notification naming one or more log objects.
 */
export const BatchTriggerSchema = z.object({
  Records: z.array(z.unknown()).refine(
    (records) => records.some((record) => typeof record === 'object' && record !== null && 's3' in record),
    { message: 'No S3 entries in Records' }
  ),
});

export type BatchTrigger = z.infer<typeof BatchTriggerSchema>;

/**
 * Single-event trigger: anything carrying a `detail` object.
 */
export const SingleEventTriggerSchema = z.object({
  detail: z.record(z.unknown()),
}).passthrough();

export type SingleEventTrigger = z.infer<typeof SingleEventTriggerSchema>;

/**
 * Trigger modes accepted by a deployment
 */
export const TriggerModeSchema = z.enum(['auto', 'eventbridge', 's3']);

export type TriggerMode = z.infer<typeof TriggerModeSchema>;

/**
 * Location of a log object in S3
 */
export interface LogObjectRef {
  bucket: string;
  key: string;
}

/**
 * Per-resource failure as reported in response bodies.
 */
export const FailedResourceSchema = z.object({
  resource_id: z.string(),
  error: z.string(),
});

export type FailedResource = z.infer<typeof FailedResourceSchema>;

/**
 * Response body for a single-event invocation.
 */
export const SingleEventSummarySchema = z.object({
  message: z.string(),
  event_name: z.string(),
  service: z.string(),
  resource_type: z.string(),
  tagged_count: z.number().int().nonnegative(),
  failed_count: z.number().int().nonnegative(),
  tagged_resources: z.array(z.string()),
  failed_resources: z.array(FailedResourceSchema),
  user_arn: z.string(),
  timestamp: z.string().nullable(),
});

export type SingleEventSummary = z.infer<typeof SingleEventSummarySchema>;

/**
 * Response body for a batch invocation. Counts only.
 */
export const BatchSummarySchema = z.object({
  message: z.string(),
  objects_processed: z.number().int().nonnegative(),
  objects_failed: z.number().int().nonnegative(),
  events_processed: z.number().int().nonnegative(),
  events_skipped: z.number().int().nonnegative(),
  tagged_count: z.number().int().nonnegative(),
  failed_count: z.number().int().nonnegative(),
});

export type BatchSummary = z.infer<typeof BatchSummarySchema>;

/**
 * Response body for rejected or failed invocations.
 */
export const ErrorSummarySchema = z.object({
  message: z.string(),
  error: z.string().optional(),
});

export type ErrorSummary = z.infer<typeof ErrorSummarySchema>;

/**
 * Structured result handed back to the trigger transport.
 */
export const PipelineResponseSchema = z.object({
  statusCode: z.union([z.literal(200), z.literal(400), z.literal(500)]),
  body: z.string().describe('JSON-encoded summary'),
});

export type PipelineResponse = z.infer<typeof PipelineResponseSchema>;
