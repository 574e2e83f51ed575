/**
 * Runtime - Public API
 *
 * Configuration, logging and error types shared by every pipeline stage.
 */

export {
  TaggerConfigSchema,
  loadConfig,
  configuredTags,
  type TaggerConfig,
} from './config.js';

export {
  TaggerError,
  TaggerErrorCode,
  BackendError,
  normalizeError,
  describeFailure,
} from './errors.js';

export {
  TelemetryEmitter,
  createTelemetryEmitter,
  createSilentTelemetry,
  type TelemetryConfig,
  type TelemetrySpan,
  type SpanType,
  type SpanStatus,
  type SpanAttributes,
} from './telemetry.js';

export { safeJsonParse, decodeS3Key, isNonEmptyString } from './utils.js';
