/**
 * Event Normalizer
 *
 * Converts a raw CloudTrail creation event (EventBridge envelope) into a
 * canonical CreationFact using the static event schema table.
 *
 * Any shape mismatch is a soft failure: the event is dropped and
 * `undefined` is returned. Nothing here throws on bad input.
 */

import {
  CloudTrailRecordSchema,
  RawEventSchema,
  type CreationFact,
} from '@auto-tagger/contracts';
import type { TelemetryEmitter } from '../runtime/telemetry.js';
import { resolveActorIdentity } from './actor-identity.js';
import { getEventSchema } from './event-schemas.js';
import { collectIds, navigate } from './path-navigator.js';
import type { IEventNormalizer } from './types.js';

export class EventNormalizer implements IEventNormalizer {
  constructor(private readonly telemetry?: TelemetryEmitter) {}

  normalize(rawEvent: unknown): CreationFact | undefined {
    const envelope = RawEventSchema.safeParse(rawEvent);
    if (!envelope.success) {
      this.drop('Event has no detail object');
      return undefined;
    }

    const detail = envelope.data.detail;
    const parsed = CloudTrailRecordSchema.safeParse(detail);
    if (!parsed.success) {
      this.drop('Event detail is not a CloudTrail record', {
        issues: parsed.error.errors.map((issue) => issue.path.join('.')),
      });
      return undefined;
    }

    const record = parsed.data;
    const actorIdentity = resolveActorIdentity(record.userIdentity);
    if (!actorIdentity) {
      this.drop('Could not resolve actor identity', { event_name: record.eventName });
      return undefined;
    }

    const schema = getEventSchema(record.eventName);
    if (!schema) {
      this.drop('Event not in supported events', { event_name: record.eventName });
      return undefined;
    }

    const [firstId, ...otherIds] = collectIds(navigate(detail, schema.idPath), schema.idKey);
    if (firstId === undefined) {
      this.drop('Could not extract resource ids', { event_name: record.eventName });
      return undefined;
    }

    return {
      actorIdentity,
      eventName: record.eventName,
      service: schema.service,
      resourceKind: schema.resourceKind,
      resourceIds: [firstId, ...otherIds],
      eventTime: record.eventTime,
      region: record.awsRegion,
      sourceIp: record.sourceIPAddress,
      userAgent: record.userAgent,
      requestId: record.requestID,
      accountId: record.userIdentity?.accountId,
    };
  }

  private drop(reason: string, context?: Record<string, unknown>): void {
    this.telemetry?.debug(`Event dropped: ${reason}`, context);
  }
}

export function createEventNormalizer(telemetry?: TelemetryEmitter): EventNormalizer {
  return new EventNormalizer(telemetry);
}
