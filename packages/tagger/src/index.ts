/**
 * Auto-Tagger
 *
 * Tags newly created AWS resources with the identity that created them.
 * CloudTrail creation events arrive one at a time through EventBridge or in
 * batches as log objects delivered to S3; each is normalized into a creation
 * fact and its resources are tagged through the owning service's API.
 */

export const VERSION = '1.0.0';

// Runtime infrastructure
export * from './runtime/index.js';

// CloudTrail event → CreationFact
export * from './event-normalization/index.js';

// CloudTrail log object → raw events
export * from './batch-extraction/index.js';

// CreationFact → tags on cloud resources
export * from './tagging/index.js';

// Trigger routing and the Lambda entry point
export * from './pipeline/index.js';
