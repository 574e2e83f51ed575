import { z } from 'zod';

/**
 * Ordered tag key → value mapping.
 */
export const TagSetSchema = z.record(z.string());

export type TagSet = z.infer<typeof TagSetSchema>;

/**
 * A resource that could not be tagged.
 */
export const TaggingFailureSchema = z.object({
  resourceId: z.string(),
  errorCode: z.string().describe('Backend error code, or UnsupportedService / TableArnNotFound'),
  error: z.string().describe('"<code>: <message>" when the backend gave a message, otherwise the code'),
});

export type TaggingFailure = z.infer<typeof TaggingFailureSchema>;

/**
 * Result of tagging every resource of one creation fact.
 */
export const TaggingOutcomeSchema = z.object({
  taggedIds: z.array(z.string()),
  failures: z.array(TaggingFailureSchema),
});

export type TaggingOutcome = z.infer<typeof TaggingOutcomeSchema>;

export function emptyOutcome(): TaggingOutcome {
  return { taggedIds: [], failures: [] };
}

/**
 * Concatenate outcomes in order
 */
export function mergeOutcomes(...outcomes: TaggingOutcome[]): TaggingOutcome {
  return outcomes.reduce<TaggingOutcome>(
    (acc, outcome) => ({
      taggedIds: [...acc.taggedIds, ...outcome.taggedIds],
      failures: [...acc.failures, ...outcome.failures],
    }),
    emptyOutcome()
  );
}
