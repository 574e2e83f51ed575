/**
 * Log Source
 *
 * Fetches delivered CloudTrail log objects from S3.
 */

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { LogObjectRef } from '@auto-tagger/contracts';
import { TaggerError, TaggerErrorCode } from '../runtime/errors.js';

export interface LogSource {
  fetch(ref: LogObjectRef): Promise<Uint8Array>;
}

export class S3LogSource implements LogSource {
  constructor(private readonly client: S3Client) {}

  async fetch(ref: LogObjectRef): Promise<Uint8Array> {
    const command = new GetObjectCommand({ Bucket: ref.bucket, Key: ref.key });
    const output = await this.client.send(command);

    if (!output.Body) {
      throw new TaggerError(
        `Empty body for s3://${ref.bucket}/${ref.key}`,
        TaggerErrorCode.LOG_SOURCE_ERROR,
        ref
      );
    }

    return output.Body.transformToByteArray();
  }
}

export function createS3LogSource(region?: string): S3LogSource {
  return new S3LogSource(new S3Client(region ? { region } : {}));
}
