/**
 * Tag Applicator
 *
 * Applies the ownership tag set of a CreationFact to every resource it names.
 * Each resource is tagged independently: a failure is recorded against that
 * resource and never stops its siblings. There is no rollback, so partial
 * success is a normal outcome.
 */

import {
  isSupportedService,
  type CreationFact,
  type TagSet,
  type TaggingFailure,
  type TaggingOutcome,
} from '@auto-tagger/contracts';
import { describeFailure } from '../runtime/errors.js';
import { isNonEmptyString } from '../runtime/utils.js';
import type { TelemetryEmitter, TelemetrySpan } from '../runtime/telemetry.js';
import { createDefaultBackends, type TagBackend, type TagBackendRegistry } from './backends.js';
import { buildTagSet } from './tag-set.js';

export const UNSUPPORTED_SERVICE_CODE = 'UnsupportedService';
export const UNSUPPORTED_SERVICE_MESSAGE = 'Unsupported service';

export interface TagApplicatorOptions {
  /** Region used when a fact carries none, or an empty one */
  defaultRegion: string;
  backends?: TagBackendRegistry;
  telemetry?: TelemetryEmitter;
  /** Source of CreatedDate */
  clock?: () => Date;
}

type ResourceResult =
  | { status: 'tagged'; resourceId: string }
  | { status: 'failed'; failure: TaggingFailure };

export class TagApplicator {
  private readonly defaultRegion: string;
  private readonly backends: TagBackendRegistry;
  private readonly telemetry?: TelemetryEmitter;
  private readonly clock: () => Date;

  constructor(options: TagApplicatorOptions) {
    this.defaultRegion = options.defaultRegion;
    this.backends = options.backends ?? createDefaultBackends();
    this.telemetry = options.telemetry;
    this.clock = options.clock ?? (() => new Date());
  }

  async apply(fact: CreationFact, additionalTags: TagSet = {}): Promise<TaggingOutcome> {
    if (!isSupportedService(fact.service)) {
      this.telemetry?.warn('Unsupported service', { service: fact.service, event_name: fact.eventName });
      return {
        taggedIds: [],
        failures: fact.resourceIds.map((resourceId) => ({
          resourceId,
          errorCode: UNSUPPORTED_SERVICE_CODE,
          error: UNSUPPORTED_SERVICE_MESSAGE,
        })),
      };
    }

    const backend = this.backends[fact.service];
    const tags = buildTagSet(fact.actorIdentity, additionalTags, this.clock());
    const region = isNonEmptyString(fact.region) ? fact.region : this.defaultRegion;

    const span = this.telemetry?.startSpan({
      name: `tagging.${fact.service}`,
      type: 'tagging.apply',
      attributes: {
        'service': fact.service,
        'resource.kind': fact.resourceKind,
        'resource.count': fact.resourceIds.length,
        'region': region,
      },
    });

    const results = await Promise.all(
      fact.resourceIds.map((resourceId) =>
        this.tagOne(backend, { resourceId, resourceKind: fact.resourceKind, region, tags }, span)
      )
    );

    const outcome: TaggingOutcome = { taggedIds: [], failures: [] };
    for (const result of results) {
      if (result.status === 'tagged') {
        outcome.taggedIds.push(result.resourceId);
      } else {
        outcome.failures.push(result.failure);
      }
    }

    if (span) {
      span.attributes['tagged.count'] = outcome.taggedIds.length;
      span.attributes['failed.count'] = outcome.failures.length;
      this.telemetry?.endSpan(span, outcome.failures.length > 0 ? 'error' : 'ok');
    }

    return outcome;
  }

  private async tagOne(
    backend: TagBackend,
    request: { resourceId: string; resourceKind: string; region: string; tags: TagSet },
    span: TelemetrySpan | undefined
  ): Promise<ResourceResult> {
    try {
      await backend.tagResource(request);
      return { status: 'tagged', resourceId: request.resourceId };
    } catch (error) {
      const { code, message } = describeFailure(error);
      const failure: TaggingFailure = {
        resourceId: request.resourceId,
        errorCode: code,
        error: message ? `${code}: ${message}` : code,
      };

      this.telemetry?.warn(`Failed to tag ${backend.service} resource`, {
        resource_id: request.resourceId,
        error_code: code,
        error_message: message,
      });
      if (span) {
        this.telemetry?.addSpanEvent(span, 'resource.failed', {
          'resource.id': request.resourceId,
          'error.code': code,
        });
      }

      return { status: 'failed', failure };
    }
  }
}
