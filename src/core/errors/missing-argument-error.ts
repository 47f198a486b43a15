// SPDX-License-Identifier: Apache-2.0

import {ClaimctlError} from './claimctl-error.js';

export class MissingArgumentError extends ClaimctlError {
  /**
   * Create a custom error for missing argument scenario
   *
   * @param message - error message
   * @param cause - source error (if any)
   */
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
