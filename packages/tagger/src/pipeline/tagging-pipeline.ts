/**
 * Tagging Pipeline
 *
 * Routes one trigger through normalize → apply (single event) or
 * fetch → extract → normalize → apply (S3-delivered log batch) and
 * summarizes the result as a status code plus JSON body.
 *
 * `handle` never throws: every fault becomes a 500 response.
 */

import {
  emptyOutcome,
  mergeOutcomes,
  type BatchSummary,
  type CreationFact,
  type ErrorSummary,
  type LogObjectRef,
  type PipelineResponse,
  type S3NotificationRecord,
  type SingleEventSummary,
  type TagSet,
  type TaggingOutcome,
} from '@auto-tagger/contracts';
import { BatchExtractor, type LogSource } from '../batch-extraction/index.js';
import { EventNormalizer } from '../event-normalization/index.js';
import { configuredTags, type TaggerConfig } from '../runtime/config.js';
import { normalizeError } from '../runtime/errors.js';
import { createSilentTelemetry, type TelemetryEmitter, type TelemetrySpan } from '../runtime/telemetry.js';
import { decodeS3Key } from '../runtime/utils.js';
import { TagApplicator } from '../tagging/index.js';
import { detectTrigger, isTriggerEnabled } from './trigger.js';

export const SERVICE_NAME = 'auto-tagger';
export const SERVICE_VERSION = '1.0.0';

export const SINGLE_EVENT_MESSAGE = 'Resource tagging completed';
export const BATCH_MESSAGE = 'Batch tagging completed';
export const UNRECOGNIZED_TRIGGER_MESSAGE = 'Unrecognized trigger payload';
export const UNSUPPORTED_EVENT_MESSAGE = 'Event not supported or could not be parsed';
export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export interface TaggingPipelineOptions {
  config: TaggerConfig;
  logSource: LogSource;
  applicator?: TagApplicator;
  normalizer?: EventNormalizer;
  extractor?: BatchExtractor;
  telemetry?: TelemetryEmitter;
}

export interface HealthStatus {
  status: 'healthy';
  service: string;
  version: string;
}

interface BatchCounters {
  objectsProcessed: number;
  objectsFailed: number;
  eventsProcessed: number;
  eventsSkipped: number;
  outcome: TaggingOutcome;
}

type ResponseBody = SingleEventSummary | BatchSummary | ErrorSummary;

/**
 * Configured static tags followed by the per-event provenance tags
 */
export function additionalTagsFor(config: TaggerConfig, fact: CreationFact): TagSet {
  return {
    ...configuredTags(config),
    ...(fact.sourceIp ? { SourceIP: fact.sourceIp } : {}),
    ...(fact.accountId ? { AccountId: fact.accountId } : {}),
  };
}

function respond(statusCode: PipelineResponse['statusCode'], body: ResponseBody): PipelineResponse {
  return { statusCode, body: JSON.stringify(body) };
}

export class TaggingPipeline {
  private readonly config: TaggerConfig;
  private readonly logSource: LogSource;
  private readonly applicator: TagApplicator;
  private readonly normalizer: EventNormalizer;
  private readonly extractor: BatchExtractor;
  private readonly telemetry: TelemetryEmitter;

  constructor(options: TaggingPipelineOptions) {
    this.config = options.config;
    this.logSource = options.logSource;
    this.telemetry = options.telemetry ?? createSilentTelemetry();
    this.applicator = options.applicator ?? new TagApplicator({
      defaultRegion: options.config.defaultRegion,
      telemetry: this.telemetry,
    });
    this.normalizer = options.normalizer ?? new EventNormalizer(this.telemetry);
    this.extractor = options.extractor ?? new BatchExtractor(this.telemetry);
  }

  async handle(trigger: unknown): Promise<PipelineResponse> {
    const span = this.telemetry.startSpan({
      name: 'pipeline.handle',
      type: 'pipeline.invocation',
      attributes: { 'trigger.mode': this.config.triggerMode },
    });

    try {
      const detected = detectTrigger(trigger);
      span.attributes['trigger.kind'] = detected.kind;

      if (detected.kind === 'unrecognized' || !isTriggerEnabled(this.config.triggerMode, detected.kind)) {
        this.telemetry.warn('Rejected trigger payload', { kind: detected.kind, mode: this.config.triggerMode });
        this.telemetry.endSpan(span, 'ok');
        return respond(400, { message: UNRECOGNIZED_TRIGGER_MESSAGE });
      }

      const response = detected.kind === 'single'
        ? await this.handleSingle(detected.event)
        : await this.handleBatch(detected.records, detected.malformed, span);

      span.attributes['status_code'] = response.statusCode;
      this.telemetry.endSpan(span, 'ok');
      return response;
    } catch (error) {
      const normalized = normalizeError(error);
      this.telemetry.error('Pipeline invocation failed', normalized);
      this.telemetry.endSpan(span, 'error', normalized);
      return respond(500, { message: INTERNAL_ERROR_MESSAGE, error: normalized.message });
    }
  }

  healthCheck(): HealthStatus {
    return { status: 'healthy', service: SERVICE_NAME, version: SERVICE_VERSION };
  }

  private async handleSingle(event: unknown): Promise<PipelineResponse> {
    const fact = this.normalizer.normalize(event);
    if (!fact) {
      return respond(400, { message: UNSUPPORTED_EVENT_MESSAGE });
    }

    this.telemetry.info('Processing creation event', {
      event_name: fact.eventName,
      service: fact.service,
      resource_ids: fact.resourceIds,
      actor: fact.actorIdentity,
    });

    const outcome = await this.applicator.apply(fact, additionalTagsFor(this.config, fact));

    return respond(200, {
      message: SINGLE_EVENT_MESSAGE,
      event_name: fact.eventName,
      service: fact.service,
      resource_type: fact.resourceKind,
      tagged_count: outcome.taggedIds.length,
      failed_count: outcome.failures.length,
      tagged_resources: outcome.taggedIds,
      failed_resources: outcome.failures.map((failure) => ({
        resource_id: failure.resourceId,
        error: failure.error,
      })),
      user_arn: fact.actorIdentity,
      timestamp: fact.eventTime ?? null,
    });
  }

  private async handleBatch(
    records: S3NotificationRecord[],
    malformed: number,
    parent: TelemetrySpan
  ): Promise<PipelineResponse> {
    const counters: BatchCounters = {
      objectsProcessed: 0,
      objectsFailed: malformed,
      eventsProcessed: 0,
      eventsSkipped: 0,
      outcome: emptyOutcome(),
    };

    for (const record of records) {
      await this.processObject(record, counters, parent);
    }

    this.telemetry.info('Batch processing complete', {
      objects_processed: counters.objectsProcessed,
      objects_failed: counters.objectsFailed,
      events_processed: counters.eventsProcessed,
      events_skipped: counters.eventsSkipped,
      tagged_count: counters.outcome.taggedIds.length,
      failed_count: counters.outcome.failures.length,
    });

    return respond(200, {
      message: BATCH_MESSAGE,
      objects_processed: counters.objectsProcessed,
      objects_failed: counters.objectsFailed,
      events_processed: counters.eventsProcessed,
      events_skipped: counters.eventsSkipped,
      tagged_count: counters.outcome.taggedIds.length,
      failed_count: counters.outcome.failures.length,
    });
  }

  private async processObject(
    record: S3NotificationRecord,
    counters: BatchCounters,
    parent: TelemetrySpan
  ): Promise<void> {
    const span = this.telemetry.startSpan({
      name: 'pipeline.batch_object',
      type: 'pipeline.batch_object',
      traceId: parent.trace_id,
      parentSpanId: parent.span_id,
      attributes: { bucket: record.s3.bucket.name },
    });

    const fetched = await this.fetchObject(record, span);
    if (fetched === undefined) {
      counters.objectsFailed++;
      this.telemetry.endSpan(span, 'error');
      return;
    }

    const events = this.extractor.tryExtract(fetched.bytes);
    if (events === undefined) {
      counters.objectsFailed++;
      this.telemetry.warn('Unreadable CloudTrail log object', { ...fetched.ref });
      this.telemetry.endSpan(span, 'error');
      return;
    }

    counters.objectsProcessed++;
    span.attributes['events.count'] = events.length;

    for (const event of events) {
      const fact = this.normalizer.normalize(event);
      if (!fact) {
        counters.eventsSkipped++;
        continue;
      }

      counters.eventsProcessed++;
      const outcome = await this.applicator.apply(fact, additionalTagsFor(this.config, fact));
      counters.outcome = mergeOutcomes(counters.outcome, outcome);
    }

    this.telemetry.endSpan(span, 'ok');
  }

  private async fetchObject(
    record: S3NotificationRecord,
    parent: TelemetrySpan
  ): Promise<{ ref: LogObjectRef; bytes: Uint8Array } | undefined> {
    const span = this.telemetry.startSpan({
      name: 'log_source.fetch',
      type: 'log_source.fetch',
      traceId: parent.trace_id,
      parentSpanId: parent.span_id,
      attributes: { bucket: record.s3.bucket.name },
    });

    try {
      const ref: LogObjectRef = {
        bucket: record.s3.bucket.name,
        key: decodeS3Key(record.s3.object.key),
      };
      span.attributes['key'] = ref.key;
      parent.attributes['key'] = ref.key;

      const bytes = await this.logSource.fetch(ref);
      span.attributes['bytes'] = bytes.length;
      this.telemetry.endSpan(span, 'ok');
      return { ref, bytes };
    } catch (error) {
      const normalized = normalizeError(error);
      this.telemetry.error('Failed to fetch CloudTrail log object', normalized, {
        bucket: record.s3.bucket.name,
        key: record.s3.object.key,
      });
      this.telemetry.endSpan(span, 'error', normalized);
      return undefined;
    }
  }
}

export function createTaggingPipeline(options: TaggingPipelineOptions): TaggingPipeline {
  return new TaggingPipeline(options);
}
