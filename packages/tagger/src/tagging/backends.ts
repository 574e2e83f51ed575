/**
 * Tag Backends
 *
 * One backend per taggable service. Each knows how its service addresses a
 * resource and what its tag-write call looks like, and keeps its own
 * per-region client cache.
 */

import { CreateTagsCommand, EC2Client } from '@aws-sdk/client-ec2';
import { PutBucketTaggingCommand, S3Client } from '@aws-sdk/client-s3';
import { AddTagsToResourceCommand, RDSClient } from '@aws-sdk/client-rds';
import { LambdaClient, TagResourceCommand as LambdaTagResourceCommand } from '@aws-sdk/client-lambda';
import {
  DescribeTableCommand,
  DynamoDBClient,
  TagResourceCommand as DynamoDBTagResourceCommand,
} from '@aws-sdk/client-dynamodb';
import { SNSClient, TagResourceCommand as SNSTagResourceCommand } from '@aws-sdk/client-sns';
import { SQSClient, TagQueueCommand } from '@aws-sdk/client-sqs';
import type { SupportedService, TagSet } from '@auto-tagger/contracts';
import { BackendError } from '../runtime/errors.js';
import { RegionalClientCache } from './client-cache.js';
import { toKeyValueTags } from './tag-set.js';

export interface TagRequest {
  resourceId: string;
  resourceKind: string;
  region: string;
  tags: TagSet;
}

/**
 * Writes tags to one resource. Throws on failure; the applicator turns the
 * error into a per-resource failure entry.
 */
export interface TagBackend {
  readonly service: SupportedService;
  tagResource(request: TagRequest): Promise<void>;
}

export type ClientFactory<C> = (region: string) => C;

/**
 * Base for backends that talk to an AWS SDK v3 client
 */
export abstract class SdkTagBackend<C> implements TagBackend {
  abstract readonly service: SupportedService;
  protected readonly clients: RegionalClientCache<C>;

  constructor(factory: ClientFactory<C>) {
    this.clients = new RegionalClientCache(factory);
  }

  async tagResource(request: TagRequest): Promise<void> {
    await this.tag(this.clients.get(request.region), request);
  }

  protected abstract tag(client: C, request: TagRequest): Promise<void>;
}

export class Ec2TagBackend extends SdkTagBackend<EC2Client> {
  readonly service = 'ec2';

  constructor(factory: ClientFactory<EC2Client> = (region) => new EC2Client({ region })) {
    super(factory);
  }

  protected async tag(client: EC2Client, { resourceId, tags }: TagRequest): Promise<void> {
    await client.send(new CreateTagsCommand({
      Resources: [resourceId],
      Tags: toKeyValueTags(tags),
    }));
  }
}

export class S3TagBackend extends SdkTagBackend<S3Client> {
  readonly service = 's3';

  constructor(factory: ClientFactory<S3Client> = (region) => new S3Client({ region })) {
    super(factory);
  }

  protected async tag(client: S3Client, { resourceId, tags }: TagRequest): Promise<void> {
    await client.send(new PutBucketTaggingCommand({
      Bucket: resourceId,
      Tagging: { TagSet: toKeyValueTags(tags) },
    }));
  }
}

/**
 * RDS ARN for an instance or cluster identifier. The account is not known
 * here, so the account segment is a wildcard.
 */
export function rdsResourceArn(region: string, resourceKind: string, resourceId: string): string {
  switch (resourceKind) {
    case 'db':
      return `arn:aws:rds:${region}:*:db:${resourceId}`;
    case 'cluster':
      return `arn:aws:rds:${region}:*:cluster:${resourceId}`;
    default:
      return resourceId;
  }
}

export class RdsTagBackend extends SdkTagBackend<RDSClient> {
  readonly service = 'rds';

  constructor(factory: ClientFactory<RDSClient> = (region) => new RDSClient({ region })) {
    super(factory);
  }

  protected async tag(client: RDSClient, { resourceId, resourceKind, region, tags }: TagRequest): Promise<void> {
    await client.send(new AddTagsToResourceCommand({
      ResourceName: rdsResourceArn(region, resourceKind, resourceId),
      Tags: toKeyValueTags(tags),
    }));
  }
}

export class LambdaTagBackend extends SdkTagBackend<LambdaClient> {
  readonly service = 'lambda';

  constructor(factory: ClientFactory<LambdaClient> = (region) => new LambdaClient({ region })) {
    super(factory);
  }

  protected async tag(client: LambdaClient, { resourceId, tags }: TagRequest): Promise<void> {
    await client.send(new LambdaTagResourceCommand({
      Resource: resourceId,
      Tags: { ...tags },
    }));
  }
}

/**
 * DynamoDB tags by ARN only, so the table name is resolved first.
 */
export class DynamoDBTagBackend extends SdkTagBackend<DynamoDBClient> {
  readonly service = 'dynamodb';

  constructor(factory: ClientFactory<DynamoDBClient> = (region) => new DynamoDBClient({ region })) {
    super(factory);
  }

  protected async tag(client: DynamoDBClient, { resourceId, tags }: TagRequest): Promise<void> {
    const described = await client.send(new DescribeTableCommand({ TableName: resourceId }));
    const tableArn = described.Table?.TableArn;
    if (!tableArn) {
      throw new BackendError('TableArnNotFound', `DescribeTable returned no ARN for ${resourceId}`);
    }

    await client.send(new DynamoDBTagResourceCommand({
      ResourceArn: tableArn,
      Tags: toKeyValueTags(tags),
    }));
  }
}

export class SnsTagBackend extends SdkTagBackend<SNSClient> {
  readonly service = 'sns';

  constructor(factory: ClientFactory<SNSClient> = (region) => new SNSClient({ region })) {
    super(factory);
  }

  protected async tag(client: SNSClient, { resourceId, tags }: TagRequest): Promise<void> {
    await client.send(new SNSTagResourceCommand({
      ResourceArn: resourceId,
      Tags: toKeyValueTags(tags),
    }));
  }
}

export class SqsTagBackend extends SdkTagBackend<SQSClient> {
  readonly service = 'sqs';

  constructor(factory: ClientFactory<SQSClient> = (region) => new SQSClient({ region })) {
    super(factory);
  }

  protected async tag(client: SQSClient, { resourceId, tags }: TagRequest): Promise<void> {
    await client.send(new TagQueueCommand({
      QueueUrl: resourceId,
      Tags: { ...tags },
    }));
  }
}

/**
 * Exactly one backend per supported service
 */
export type TagBackendRegistry = { readonly [S in SupportedService]: TagBackend & { readonly service: S } };

export function createDefaultBackends(): TagBackendRegistry {
  return {
    ec2: new Ec2TagBackend(),
    s3: new S3TagBackend(),
    rds: new RdsTagBackend(),
    lambda: new LambdaTagBackend(),
    dynamodb: new DynamoDBTagBackend(),
    sns: new SnsTagBackend(),
    sqs: new SqsTagBackend(),
  };
}
