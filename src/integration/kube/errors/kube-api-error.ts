// SPDX-License-Identifier: Apache-2.0

import {ClaimctlError} from '../../../core/errors/claimctl-error.js';

export class KubeApiError extends ClaimctlError {
  /**
   * Instantiates a new error with a message and an optional cause.
   *
   * @param message - the error message.
   * @param statusCode - the HTTP status code.
   * @param cause - optional underlying cause of the error.
   * @param meta - optional metadata to be reported.
   */
  public constructor(message: string, statusCode: number, cause?: unknown, meta: Record<string, unknown> = {}) {
    super(message + `, statusCode: ${statusCode}`, cause, {...meta, statusCode});
  }
}
