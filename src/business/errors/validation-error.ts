// SPDX-License-Identifier: Apache-2.0

import {ClaimctlError} from '../../core/errors/claimctl-error.js';

/**
 * Raised when the raw claim options have the wrong shape, e.g. a missing name or an unknown access mode.
 */
export class ValidationError extends ClaimctlError {
  public constructor(message: string, meta: Record<string, unknown> = {}) {
    super(message, undefined, meta);
  }
}
