// SPDX-License-Identifier: Apache-2.0

import {ClaimctlError} from './claimctl-error.js';

export class UserBreak extends ClaimctlError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
