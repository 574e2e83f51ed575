import { z } from 'zod';

/**
 * Services whose resources can be tagged.
 */
export const SupportedServiceSchema = z.enum([
  'ec2',
  's3',
  'rds',
  'lambda',
  'dynamodb',
  'sns',
  'sqs',
]);

export type SupportedService = z.infer<typeof SupportedServiceSchema>;

/**
 * Canonical "some actor created some resources" fact.
 *
 * @remarks
 * `resourceIds` is never empty: an event without extractable ids is dropped
 * rather than represented.
 */
export const CreationFactSchema = z.object({
  actorIdentity: z.string().min(1).describe('IAM ARN, synthesized root ARN, or raw principal id'),
  eventName: z.string(),
  service: z.string(),
  resourceKind: z.string(),
  resourceIds: z.array(z.string().min(1)).nonempty(),
  eventTime: z.string().optional(),
  region: z.string().optional(),

  sourceIp: z.string().optional(),
  userAgent: z.string().optional(),
  requestId: z.string().optional(),
  accountId: z.string().optional(),
});

export type CreationFact = z.infer<typeof CreationFactSchema>;

export function isSupportedService(value: string): value is SupportedService {
  return SupportedServiceSchema.safeParse(value).success;
}
