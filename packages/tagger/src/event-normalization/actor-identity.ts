/**
 * Actor identity resolution for CloudTrail `userIdentity` blocks.
 */

import type { UserIdentity } from '@auto-tagger/contracts';
import { isNonEmptyString } from '../runtime/utils.js';

export function rootAccountArn(accountId: string): string {
  return `arn:aws:iam::${accountId}:root`;
}

/**
 * Resolve who made the call.
 *
 * Order: the identity ARN; a synthesized root ARN for Root callers; the raw
 * principal id. The principal id may be "<accessKeyId>:<sessionName>" and is
 * returned as is.
 */
export function resolveActorIdentity(identity: UserIdentity | undefined): string | undefined {
  if (!identity) {
    return undefined;
  }

  if (isNonEmptyString(identity.arn)) {
    return identity.arn;
  }

  if (identity.type === 'Root' && isNonEmptyString(identity.accountId)) {
    return rootAccountArn(identity.accountId);
  }

  if (isNonEmptyString(identity.principalId)) {
    return identity.principalId;
  }

  return undefined;
}
