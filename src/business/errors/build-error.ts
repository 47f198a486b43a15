// SPDX-License-Identifier: Apache-2.0

import {ClaimctlError} from '../../core/errors/claimctl-error.js';

/**
 * Raised when parsed claim values conflict with each other.
 */
export class BuildError extends ClaimctlError {
  public static readonly LIMIT_NOT_GREATER_THAN_REQUEST = 'resource limit is the same/less than the resource request';

  public constructor(message: string, meta: Record<string, unknown> = {}) {
    super(message, undefined, meta);
  }
}
