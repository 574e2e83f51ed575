/**
 * Tag Applicator Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { CreationFact } from '@auto-tagger/contracts';
import { TagApplicator, UNSUPPORTED_SERVICE_CODE, UNSUPPORTED_SERVICE_MESSAGE } from '../tag-applicator.js';
import type { TagRequest } from '../backends.js';
import { buildTagSet, toKeyValueTags, MANAGED_BY_VALUE } from '../tag-set.js';
import { BackendError } from '../../runtime/errors.js';
import { createSilentTelemetry } from '../../runtime/telemetry.js';
import { TEST_USER_ARN, createFakeBackends, type FakeBackends } from '../../__tests__/fixtures.js';

const NOW = new Date('2024-05-01T12:34:56.000Z');

const instanceFact = (resourceIds: [string, ...string[]], region?: string): CreationFact => ({
  actorIdentity: TEST_USER_ARN,
  eventName: 'RunInstances',
  service: 'ec2',
  resourceKind: 'instance',
  resourceIds,
  region,
});

describe('TagApplicator', () => {
  let backends: FakeBackends;
  let applicator: TagApplicator;

  beforeEach(() => {
    backends = createFakeBackends();
    applicator = new TagApplicator({
      defaultRegion: 'us-east-1',
      backends,
      telemetry: createSilentTelemetry(),
      clock: () => NOW,
    });
  });

  it('should tag every resource with the same tag set', async () => {
    const outcome = await applicator.apply(instanceFact(['i-1', 'i-2'], 'eu-west-1'), { Environment: 'test' });

    expect(outcome).toEqual({ taggedIds: ['i-1', 'i-2'], failures: [] });
    expect(backends.ec2.tagResource).toHaveBeenCalledTimes(2);
    expect(backends.ec2.tagResource).toHaveBeenNthCalledWith(1, {
      resourceId: 'i-1',
      resourceKind: 'instance',
      region: 'eu-west-1',
      tags: {
        CreatedBy: TEST_USER_ARN,
        CreatedDate: '2024-05-01T12:34:56.000Z',
        ManagedBy: 'auto-tagger',
        Environment: 'test',
      },
    });
    expect(backends.s3.tagResource).not.toHaveBeenCalled();
  });

  it('should use the default region when the fact has none', async () => {
    await applicator.apply(instanceFact(['i-1']));

    expect(backends.ec2.tagResource).toHaveBeenCalledWith(expect.objectContaining({ region: 'us-east-1' }));
  });

  it('should treat an empty region as missing', async () => {
    await applicator.apply(instanceFact(['i-1'], ''));

    expect(backends.ec2.tagResource).toHaveBeenCalledWith(expect.objectContaining({ region: 'us-east-1' }));
  });

  it('should record a failure without affecting sibling resources', async () => {
    const notFound = new Error("The instance ID 'i-2' does not exist");
    notFound.name = 'InvalidInstanceID.NotFound';
    backends.ec2.tagResource.mockImplementation(async (request: TagRequest) => {
      if (request.resourceId === 'i-2') {
        throw notFound;
      }
    });

    const outcome = await applicator.apply(instanceFact(['i-1', 'i-2', 'i-3']));

    expect(outcome).toEqual({
      taggedIds: ['i-1', 'i-3'],
      failures: [
        {
          resourceId: 'i-2',
          errorCode: 'InvalidInstanceID.NotFound',
          error: "InvalidInstanceID.NotFound: The instance ID 'i-2' does not exist",
        },
      ],
    });
  });

  it('should report the bare code when the error has no message', async () => {
    backends.ec2.tagResource.mockRejectedValue(new BackendError('AccessDenied', ''));

    const outcome = await applicator.apply(instanceFact(['i-1']));

    expect(outcome.failures).toEqual([{ resourceId: 'i-1', errorCode: 'AccessDenied', error: 'AccessDenied' }]);
  });

  it('should describe non-Error rejections', async () => {
    backends.ec2.tagResource.mockRejectedValue('throttled');

    const outcome = await applicator.apply(instanceFact(['i-1']));

    expect(outcome.failures).toEqual([{ resourceId: 'i-1', errorCode: 'UnknownError', error: 'UnknownError: throttled' }]);
  });

  it('should fail every resource of an unsupported service', async () => {
    const outcome = await applicator.apply({
      actorIdentity: TEST_USER_ARN,
      eventName: 'CreateCluster',
      service: 'ecs',
      resourceKind: 'cluster',
      resourceIds: ['c-1', 'c-2'],
    });

    expect(outcome).toEqual({
      taggedIds: [],
      failures: [
        { resourceId: 'c-1', errorCode: UNSUPPORTED_SERVICE_CODE, error: UNSUPPORTED_SERVICE_MESSAGE },
        { resourceId: 'c-2', errorCode: UNSUPPORTED_SERVICE_CODE, error: UNSUPPORTED_SERVICE_MESSAGE },
      ],
    });
    for (const backend of Object.values(backends)) {
      expect(backend.tagResource).not.toHaveBeenCalled();
    }
  });

  it('should dispatch to the backend of the fact service', async () => {
    await applicator.apply({
      actorIdentity: TEST_USER_ARN,
      eventName: 'CreateQueue',
      service: 'sqs',
      resourceKind: 'queue',
      resourceIds: ['https://sqs.us-west-2.amazonaws.com/111122223333/queue-1'],
      region: 'us-west-2',
    });

    expect(backends.sqs.tagResource).toHaveBeenCalledTimes(1);
    expect(backends.ec2.tagResource).not.toHaveBeenCalled();
  });
});

describe('buildTagSet', () => {
  it('should put the ownership tags first and let additional tags win', () => {
    const tags = buildTagSet(TEST_USER_ARN, { Team: 'platform', ManagedBy: 'terraform' }, NOW);

    expect(tags).toEqual({
      CreatedBy: TEST_USER_ARN,
      CreatedDate: '2024-05-01T12:34:56.000Z',
      ManagedBy: 'terraform',
      Team: 'platform',
    });
    expect(Object.keys(tags)).toEqual(['CreatedBy', 'CreatedDate', 'ManagedBy', 'Team']);
  });

  it('should default ManagedBy', () => {
    expect(buildTagSet(TEST_USER_ARN, {}, NOW)['ManagedBy']).toBe(MANAGED_BY_VALUE);
  });
});

describe('toKeyValueTags', () => {
  it('should keep tag order', () => {
    expect(toKeyValueTags({ B: '2', A: '1' })).toEqual([
      { Key: 'B', Value: '2' },
      { Key: 'A', Value: '1' },
    ]);
  });
});
