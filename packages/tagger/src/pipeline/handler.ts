/**
 * AWS Lambda Handler
 *
 * Entry point for EventBridge and S3-notification invocations. The pipeline
 * and its SDK client caches are created on first use and reused across warm
 * invocations.
 */

import type { Context } from 'aws-lambda';
import type { PipelineResponse } from '@auto-tagger/contracts';
import { createS3LogSource } from '../batch-extraction/index.js';
import { loadConfig } from '../runtime/config.js';
import { normalizeError } from '../runtime/errors.js';
import { createTelemetryEmitter } from '../runtime/telemetry.js';
import {
  INTERNAL_ERROR_MESSAGE,
  SERVICE_NAME,
  SERVICE_VERSION,
  createTaggingPipeline,
  type TaggingPipeline,
} from './tagging-pipeline.js';

/**
 * Lazy-initialized pipeline
 */
let pipeline: TaggingPipeline | undefined;

function getPipeline(): TaggingPipeline {
  if (!pipeline) {
    const config = loadConfig();
    const telemetry = createTelemetryEmitter(SERVICE_NAME, SERVICE_VERSION, {
      logLevel: config.logLevel,
      environment: config.environment,
    });
    pipeline = createTaggingPipeline({
      config,
      logSource: createS3LogSource(config.defaultRegion),
      telemetry,
    });
  }
  return pipeline;
}

export type LambdaHandler = (event: unknown, context?: Context) => Promise<PipelineResponse>;

/**
 * Build a handler around a pipeline provider. A provider that throws
 * (invalid configuration) yields a 500 response.
 */
export function createHandler(provider: () => TaggingPipeline): LambdaHandler {
  return async (event, context) => {
    let instance: TaggingPipeline;
    try {
      instance = provider();
    } catch (error) {
      const normalized = normalizeError(error);
      createTelemetryEmitter(SERVICE_NAME, SERVICE_VERSION).error(
        'Failed to initialize tagging pipeline',
        normalized,
        { code: normalized.code, request_id: context?.awsRequestId }
      );
      return {
        statusCode: 500,
        body: JSON.stringify({ message: INTERNAL_ERROR_MESSAGE, error: normalized.message }),
      };
    }

    return instance.handle(event);
  };
}

export const handler: LambdaHandler = createHandler(getPipeline);
