/**
 * Shared test data and fakes
 */

import { vi } from 'vitest';
import type { SupportedService } from '@auto-tagger/contracts';
import type { TagBackendRegistry, TagRequest } from '../tagging/backends.js';

export const TEST_ACCOUNT = '111122223333';
export const TEST_USER_ARN = `arn:aws:iam::${TEST_ACCOUNT}:user/test-user`;

export function cloudTrailRecord(
  eventName: string,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    eventVersion: '1.08',
    eventName,
    eventSource: 'ec2.amazonaws.com',
    eventTime: '2024-05-01T12:00:00Z',
    eventID: 'event-0001',
    awsRegion: 'us-west-2',
    sourceIPAddress: '198.51.100.7',
    userAgent: 'aws-cli/2.15.0',
    requestID: 'request-0001',
    recipientAccountId: TEST_ACCOUNT,
    userIdentity: {
      type: 'IAMUser',
      arn: TEST_USER_ARN,
      accountId: TEST_ACCOUNT,
      principalId: 'AIDATESTPRINCIPAL',
    },
    ...overrides,
  };
}

export function eventBridgeEvent(
  eventName: string,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    'version': '0',
    'id': 'envelope-0001',
    'detail-type': 'AWS API Call via CloudTrail',
    'source': 'aws.ec2',
    'detail': cloudTrailRecord(eventName, overrides),
  };
}

export function runInstancesEvent(instanceIds: string[]): Record<string, unknown> {
  return eventBridgeEvent('RunInstances', {
    responseElements: {
      instancesSet: {
        items: instanceIds.map((instanceId) => ({ instanceId, instanceType: 't3.micro' })),
      },
    },
  });
}

export function s3Notification(...objects: Array<{ bucket: string; key: string }>): Record<string, unknown> {
  return {
    Records: objects.map(({ bucket, key }) => ({
      eventSource: 'aws:s3',
      eventName: 'ObjectCreated:Put',
      awsRegion: 'us-west-2',
      s3: {
        bucket: { name: bucket },
        object: { key, size: 1024 },
      },
    })),
  };
}

const fakeBackend = <S extends SupportedService>(service: S) => ({
  service,
  tagResource: vi.fn(async (_request: TagRequest): Promise<void> => undefined),
});

/**
 * One recording backend per service; every call succeeds unless overridden
 */
export function createFakeBackends() {
  return {
    ec2: fakeBackend('ec2'),
    s3: fakeBackend('s3'),
    rds: fakeBackend('rds'),
    lambda: fakeBackend('lambda'),
    dynamodb: fakeBackend('dynamodb'),
    sns: fakeBackend('sns'),
    sqs: fakeBackend('sqs'),
  } satisfies TagBackendRegistry;
}

export type FakeBackends = ReturnType<typeof createFakeBackends>;
