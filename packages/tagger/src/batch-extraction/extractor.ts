/**
 * Batch Extractor
 *
 * Turns one delivered CloudTrail log object into the raw events the
 * normalizer consumes: gunzip, parse, keep successful creation events, and
 * rebuild the EventBridge envelope around each record.
 *
 * A corrupt object yields no events; it never throws. `tryExtract` tells a
 * corrupt object apart from one without taggable events.
 */

import { gunzipSync } from 'node:zlib';
import {
  CloudTrailLogFileSchema,
  CloudTrailRecordSchema,
  type CloudTrailRecord,
  type RawEvent,
} from '@auto-tagger/contracts';
import { isSupportedEvent } from '../event-normalization/event-schemas.js';
import type { TelemetryEmitter } from '../runtime/telemetry.js';

export const CLOUDTRAIL_DETAIL_TYPE = 'AWS API Call via CloudTrail';

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}

/**
 * Wrap a CloudTrail record in the envelope real-time events arrive in
 */
export function toRawEvent(record: CloudTrailRecord): RawEvent {
  const serviceLabel = (record.eventSource ?? '').split('.')[0] ?? '';

  return {
    'version': '0',
    'id': record.eventID,
    'detail-type': CLOUDTRAIL_DETAIL_TYPE,
    'source': `aws.${serviceLabel}`,
    'account': record.recipientAccountId,
    'time': record.eventTime,
    'region': record.awsRegion,
    'detail': record,
  };
}

export interface ExtractionStats {
  total: number;
  kept: number;
  unsupported: number;
  failedCalls: number;
  malformed: number;
}

export class BatchExtractor {
  constructor(private readonly telemetry?: TelemetryEmitter) {}

  /**
   * Extract supported, successful creation events from a log object body
   */
  extract(batchBytes: Uint8Array): RawEvent[] {
    return this.tryExtract(batchBytes) ?? [];
  }

  /**
   * Like `extract`, but undefined when the body cannot be decoded at all
   */
  tryExtract(batchBytes: Uint8Array): RawEvent[] | undefined {
    const records = this.decode(batchBytes);
    if (records === undefined) {
      return undefined;
    }

    const stats: ExtractionStats = {
      total: records.length,
      kept: 0,
      unsupported: 0,
      failedCalls: 0,
      malformed: 0,
    };
    const events: RawEvent[] = [];

    for (const candidate of records) {
      const parsed = CloudTrailRecordSchema.safeParse(candidate);
      if (!parsed.success) {
        stats.malformed++;
        continue;
      }

      const record = parsed.data;
      if (!isSupportedEvent(record.eventName)) {
        stats.unsupported++;
        continue;
      }

      if (record.errorCode) {
        stats.failedCalls++;
        this.telemetry?.debug('Skipping failed event', {
          event_name: record.eventName,
          error_code: record.errorCode,
        });
        continue;
      }

      events.push(toRawEvent(record));
      stats.kept++;
    }

    this.telemetry?.info('Parsed CloudTrail log batch', { ...stats });
    return events;
  }

  private decode(batchBytes: Uint8Array): unknown[] | undefined {
    try {
      const text = isGzip(batchBytes)
        ? gunzipSync(batchBytes).toString('utf8')
        : Buffer.from(batchBytes).toString('utf8');

      const parsed = CloudTrailLogFileSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        this.telemetry?.error('CloudTrail log has no Records array');
        return undefined;
      }
      return parsed.data.Records;
    } catch (error) {
      this.telemetry?.error(
        'Failed to decode CloudTrail log batch',
        error instanceof Error ? error : undefined,
        { bytes: batchBytes.length }
      );
      return undefined;
    }
  }
}

export function createBatchExtractor(telemetry?: TelemetryEmitter): BatchExtractor {
  return new BatchExtractor(telemetry);
}
