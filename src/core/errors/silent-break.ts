// SPDX-License-Identifier: Apache-2.0

import {ClaimctlError} from './claimctl-error.js';

export class SilentBreak extends ClaimctlError {
  /**
   * A silent break does not display a message to the user
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
