/**
 * Tagging - Module Exports
 */

export {
  TagApplicator,
  UNSUPPORTED_SERVICE_CODE,
  UNSUPPORTED_SERVICE_MESSAGE,
  type TagApplicatorOptions,
} from './tag-applicator.js';

export {
  SdkTagBackend,
  Ec2TagBackend,
  S3TagBackend,
  RdsTagBackend,
  LambdaTagBackend,
  DynamoDBTagBackend,
  SnsTagBackend,
  SqsTagBackend,
  createDefaultBackends,
  rdsResourceArn,
  type TagBackend,
  type TagRequest,
  type TagBackendRegistry,
  type ClientFactory,
} from './backends.js';

export { buildTagSet, toKeyValueTags, MANAGED_BY_VALUE, type KeyValueTag } from './tag-set.js';

export { RegionalClientCache } from './client-cache.js';
