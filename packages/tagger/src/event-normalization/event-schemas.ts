/**
 * Creation event schemas
 *
 * One entry per supported CloudTrail creation event. Typed against the
 * creation event name enum so a missing or misspelled event fails to compile.
 */

import { CreationEventNameSchema, isCreationEventName, type CreationEventName } from '@auto-tagger/contracts';
import type { EventSchema, EventSchemaTable } from './types.js';

const EVENT_SCHEMA_ENTRIES = {
  // EC2
  RunInstances: {
    service: 'ec2',
    resourceKind: 'instance',
    idPath: ['responseElements', 'instancesSet', 'items'],
    idKey: 'instanceId',
  },
  CreateVolume: {
    service: 'ec2',
    resourceKind: 'volume',
    idPath: ['responseElements', 'volumeId'],
  },
  CreateSnapshot: {
    service: 'ec2',
    resourceKind: 'snapshot',
    idPath: ['responseElements', 'snapshotId'],
  },
  CreateSecurityGroup: {
    service: 'ec2',
    resourceKind: 'security-group',
    idPath: ['responseElements', 'groupId'],
  },

  // S3
  CreateBucket: {
    service: 's3',
    resourceKind: 'bucket',
    idPath: ['requestParameters', 'bucketName'],
  },

  // RDS
  CreateDBInstance: {
    service: 'rds',
    resourceKind: 'db',
    idPath: ['requestParameters', 'dBInstanceIdentifier'],
  },
  CreateDBCluster: {
    service: 'rds',
    resourceKind: 'cluster',
    idPath: ['requestParameters', 'dBClusterIdentifier'],
  },

  // Lambda
  CreateFunction: {
    service: 'lambda',
    resourceKind: 'function',
    idPath: ['responseElements', 'functionName'],
  },

  // DynamoDB
  CreateTable: {
    service: 'dynamodb',
    resourceKind: 'table',
    idPath: ['responseElements', 'tableDescription', 'tableName'],
  },

  // SNS
  CreateTopic: {
    service: 'sns',
    resourceKind: 'topic',
    idPath: ['responseElements', 'topicArn'],
  },

  // SQS
  CreateQueue: {
    service: 'sqs',
    resourceKind: 'queue',
    idPath: ['responseElements', 'QueueUrl'],
  },
} as const satisfies Record<CreationEventName, EventSchema>;

export const EVENT_SCHEMAS: EventSchemaTable = new Map<CreationEventName, EventSchema>(
  CreationEventNameSchema.options.map((name): [CreationEventName, EventSchema] => [name, EVENT_SCHEMA_ENTRIES[name]])
);

export function getEventSchema(eventName: string): EventSchema | undefined {
  return isCreationEventName(eventName) ? EVENT_SCHEMAS.get(eventName) : undefined;
}

/**
 * Check if event is supported for auto-tagging
 */
export function isSupportedEvent(eventName: string): boolean {
  return getEventSchema(eventName) !== undefined;
}

export function getSupportedEvents(): CreationEventName[] {
  return [...EVENT_SCHEMAS.keys()];
}
