import { z } from 'zod';

/**
 * Creation events the tagger understands. Anything else in a CloudTrail
 * stream is ignored.
 */
export const CreationEventNameSchema = z.enum([
  'RunInstances',
  'CreateVolume',
  'CreateSnapshot',
  'CreateSecurityGroup',
  'CreateBucket',
  'CreateDBInstance',
  'CreateDBCluster',
  'CreateFunction',
  'CreateTable',
  'CreateTopic',
  'CreateQueue',
]);

export type CreationEventName = z.infer<typeof CreationEventNameSchema>;

/**
 * Optional CloudTrail text field. Records carry `null` for some absent
 * values; both `null` and a missing key read as undefined.
 */
const optionalText = z.string().nullish().transform((value) => value ?? undefined);

/**
 * CloudTrail `userIdentity` block. Only the fields used to resolve the actor
 * are typed; the rest pass through untouched.
 */
export const UserIdentitySchema = z.object({
  type: optionalText.describe('IAMUser, AssumedRole, Root, AWSService, ...'),
  arn: optionalText,
  accountId: optionalText,
  principalId: optionalText.describe('May be "<accessKeyId>:<sessionName>" for assumed roles'),
}).passthrough();

export type UserIdentity = z.infer<typeof UserIdentitySchema>;

/**
 * A single CloudTrail record, as found in the `detail` of an EventBridge
 * event or in the `Records` array of a delivered log file.
 */
export const CloudTrailRecordSchema = z.object({
  eventName: z.string(),
  eventSource: optionalText.describe('Service endpoint, e.g. "ec2.amazonaws.com"'),
  eventTime: optionalText,
  eventID: optionalText,
  awsRegion: optionalText,
  userIdentity: UserIdentitySchema.nullish().transform((identity) => identity ?? undefined),
  requestParameters: z.unknown().optional(),
  responseElements: z.unknown().optional(),
  errorCode: optionalText.describe('Present only when the API call failed'),
  errorMessage: optionalText,
  sourceIPAddress: optionalText,
  userAgent: optionalText,
  requestID: optionalText,
  recipientAccountId: optionalText,
}).passthrough();

export type CloudTrailRecord = z.infer<typeof CloudTrailRecordSchema>;

/**
 * Body of a CloudTrail log object delivered to S3 (after gunzip).
 * Records are validated one at a time by the extractor.
 */
export const CloudTrailLogFileSchema = z.object({
  Records: z.array(z.unknown()),
});

export type CloudTrailLogFile = z.infer<typeof CloudTrailLogFileSchema>;

/**
 * EventBridge-style envelope around a CloudTrail record. Real-time triggers
 * arrive in this shape; the batch extractor rebuilds it for log records.
 */
export const RawEventSchema = z.object({
  'version': z.string().optional(),
  'id': z.string().optional(),
  'detail-type': z.string().optional(),
  'source': z.string().optional(),
  'account': z.string().optional(),
  'time': z.string().optional(),
  'region': z.string().optional(),
  'detail': z.record(z.unknown()),
}).passthrough();

export type RawEvent = z.infer<typeof RawEventSchema>;

/**
 * Check whether an event name is a supported creation event
 */
export function isCreationEventName(value: unknown): value is CreationEventName {
  return CreationEventNameSchema.safeParse(value).success;
}
