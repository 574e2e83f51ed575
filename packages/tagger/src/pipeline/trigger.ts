/**
 * Trigger detection
 *
 * Decides by shape whether an invocation carries S3 log-object references
 * or a single EventBridge event.
 */

import {
  BatchTriggerSchema,
  S3NotificationRecordSchema,
  SingleEventTriggerSchema,
  type S3NotificationRecord,
  type SingleEventTrigger,
  type TriggerMode,
} from '@auto-tagger/contracts';

export type DetectedTrigger =
  | { kind: 'batch'; records: S3NotificationRecord[]; malformed: number }
  | { kind: 'single'; event: SingleEventTrigger }
  | { kind: 'unrecognized' };

export function detectTrigger(payload: unknown): DetectedTrigger {
  const batch = BatchTriggerSchema.safeParse(payload);
  if (batch.success) {
    const records: S3NotificationRecord[] = [];
    let malformed = 0;

    for (const entry of batch.data.Records) {
      if (typeof entry !== 'object' || entry === null || !('s3' in entry)) {
        continue;
      }
      const parsed = S3NotificationRecordSchema.safeParse(entry);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        malformed++;
      }
    }

    return { kind: 'batch', records, malformed };
  }

  const single = SingleEventTriggerSchema.safeParse(payload);
  if (single.success) {
    return { kind: 'single', event: single.data };
  }

  return { kind: 'unrecognized' };
}

/**
 * Whether a deployment in `mode` accepts a trigger of this kind
 */
export function isTriggerEnabled(mode: TriggerMode, kind: 'batch' | 'single'): boolean {
  switch (mode) {
    case 'auto':
      return true;
    case 'eventbridge':
      return kind === 'single';
    case 's3':
      return kind === 'batch';
  }
}
