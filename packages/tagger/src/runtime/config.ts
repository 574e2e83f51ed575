/**
 * Tagger configuration
 *
 * Read once from the Lambda environment and validated with Zod.
 */

import { z } from 'zod';
import { TagSetSchema, TriggerModeSchema } from '@auto-tagger/contracts';
import { TaggerError, TaggerErrorCode } from './errors.js';
import { safeJsonParse } from './utils.js';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const TaggerConfigSchema = z.object({
  /** Region used when an event does not carry one */
  defaultRegion: z.string().min(1).default('us-east-1'),

  /** Value of the Environment tag; no tag when unset */
  environment: z.string().min(1).optional(),

  /** Static tags layered into every tag set */
  extraTags: TagSetSchema.default({}),

  logLevel: LogLevelSchema.default('info'),

  triggerMode: TriggerModeSchema.default('auto'),
});

export type TaggerConfig = z.infer<typeof TaggerConfigSchema>;

type Environment = Record<string, string | undefined>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Environment = process.env): TaggerConfig {
  const extraTagsRaw = env['EXTRA_TAGS'];
  const extraTags: unknown = extraTagsRaw ? safeJsonParse(extraTagsRaw) : {};

  if (extraTags === undefined) {
    throw new TaggerError('EXTRA_TAGS is not valid JSON', TaggerErrorCode.CONFIG_ERROR);
  }

  const result = TaggerConfigSchema.safeParse({
    defaultRegion: env['AWS_REGION'] || undefined,
    environment: env['ENVIRONMENT'] || undefined,
    extraTags,
    logLevel: env['LOG_LEVEL'] || undefined,
    triggerMode: env['TRIGGER_MODE'] || undefined,
  });

  if (!result.success) {
    throw new TaggerError(
      'Invalid tagger configuration',
      TaggerErrorCode.CONFIG_ERROR,
      result.error.errors
    );
  }

  return result.data;
}

/**
 * Tags every tag set receives from configuration
 */
export function configuredTags(config: TaggerConfig): Record<string, string> {
  return {
    ...(config.environment ? { Environment: config.environment } : {}),
    ...config.extraTags,
  };
}
