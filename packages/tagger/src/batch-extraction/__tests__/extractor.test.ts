/**
 * Batch Extractor Tests
 */

import { gzipSync } from 'node:zlib';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BatchExtractor, CLOUDTRAIL_DETAIL_TYPE, isGzip, toRawEvent } from '../extractor.js';
import type { TelemetryEmitter } from '../../runtime/telemetry.js';
import { TEST_ACCOUNT, cloudTrailRecord } from '../../__tests__/fixtures.js';

const createMockTelemetry = (): TelemetryEmitter => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
} as unknown as TelemetryEmitter);

const bucketRecord = cloudTrailRecord('CreateBucket', {
  eventSource: 's3.amazonaws.com',
  eventID: 'event-bucket',
  requestParameters: { bucketName: 'test-bucket' },
});

const failedRunInstances = cloudTrailRecord('RunInstances', {
  eventID: 'event-failed',
  errorCode: 'Client.UnauthorizedOperation',
  errorMessage: 'You are not authorized to perform this operation.',
});

const describeRecord = cloudTrailRecord('DescribeInstances', { eventID: 'event-describe' });

function logFile(records: unknown[]): Buffer {
  return gzipSync(Buffer.from(JSON.stringify({ Records: records }), 'utf8'));
}

describe('BatchExtractor', () => {
  let telemetry: TelemetryEmitter;
  let extractor: BatchExtractor;

  beforeEach(() => {
    telemetry = createMockTelemetry();
    extractor = new BatchExtractor(telemetry);
  });

  it('should keep only successful supported creation events', () => {
    const events = extractor.extract(logFile([failedRunInstances, bucketRecord, describeRecord, 42]));

    expect(events).toEqual([
      {
        'version': '0',
        'id': 'event-bucket',
        'detail-type': CLOUDTRAIL_DETAIL_TYPE,
        'source': 'aws.s3',
        'account': TEST_ACCOUNT,
        'time': '2024-05-01T12:00:00Z',
        'region': 'us-west-2',
        'detail': bucketRecord,
      },
    ]);
    expect(telemetry.info).toHaveBeenCalledWith('Parsed CloudTrail log batch', {
      total: 4,
      kept: 1,
      unsupported: 1,
      failedCalls: 1,
      malformed: 1,
    });
  });

  it('should keep records in log order', () => {
    const volume = cloudTrailRecord('CreateVolume', { eventID: 'event-volume', responseElements: { volumeId: 'vol-1' } });
    const events = extractor.extract(logFile([volume, bucketRecord]));

    expect(events.map((event) => event.id)).toEqual(['event-volume', 'event-bucket']);
  });

  it('should keep records whose optional fields are null', () => {
    const record = cloudTrailRecord('CreateBucket', {
      eventSource: 's3.amazonaws.com',
      requestParameters: { bucketName: 'test-bucket' },
      sourceIPAddress: null,
      userAgent: null,
      errorCode: null,
    });

    const events = extractor.extract(logFile([record]));

    expect(events).toHaveLength(1);
    expect(events[0]?.detail['eventName']).toBe('CreateBucket');
    expect(events[0]?.detail['sourceIPAddress']).toBeUndefined();
  });

  it('should read plain JSON when the object is not gzipped', () => {
    const events = extractor.extract(Buffer.from(JSON.stringify({ Records: [bucketRecord] }), 'utf8'));

    expect(events).toHaveLength(1);
    expect(events[0]?.detail).toEqual(bucketRecord);
  });

  it('should return no events for a corrupt object', () => {
    expect(extractor.extract(new Uint8Array([0x1f, 0x8b, 0x01, 0x02, 0x03]))).toEqual([]);
    expect(telemetry.error).toHaveBeenCalledWith(
      'Failed to decode CloudTrail log batch',
      expect.any(Error),
      { bytes: 5 }
    );
  });

  it('should tell a corrupt object apart from one without taggable events', () => {
    expect(extractor.tryExtract(Buffer.from('not json', 'utf8'))).toBeUndefined();
    expect(extractor.tryExtract(logFile([describeRecord]))).toEqual([]);
  });

  it('should return no events when the document has no Records array', () => {
    expect(extractor.extract(Buffer.from('not json', 'utf8'))).toEqual([]);
    expect(extractor.extract(Buffer.from(JSON.stringify({ Records: 'none' }), 'utf8'))).toEqual([]);
    expect(extractor.extract(new Uint8Array())).toEqual([]);
  });
});

describe('isGzip', () => {
  it('should detect the gzip magic bytes', () => {
    expect(isGzip(gzipSync(Buffer.from('{}')))).toBe(true);
    expect(isGzip(Buffer.from('{}'))).toBe(false);
    expect(isGzip(new Uint8Array([0x1f]))).toBe(false);
  });
});

describe('toRawEvent', () => {
  it('should derive the source from the first label of eventSource', () => {
    expect(toRawEvent({ eventName: 'CreateTopic', eventSource: 'sns.amazonaws.com' }).source).toBe('aws.sns');
    expect(toRawEvent({ eventName: 'CreateTopic' }).source).toBe('aws.');
  });
});
