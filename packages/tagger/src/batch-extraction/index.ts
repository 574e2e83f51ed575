/**
 * Batch Extraction - Module Exports
 */

export {
  BatchExtractor,
  createBatchExtractor,
  toRawEvent,
  isGzip,
  CLOUDTRAIL_DETAIL_TYPE,
  type ExtractionStats,
} from './extractor.js';

export { S3LogSource, createS3LogSource, type LogSource } from './log-source.js';
