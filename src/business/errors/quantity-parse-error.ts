// SPDX-License-Identifier: Apache-2.0

import {ClaimctlError} from '../../core/errors/claimctl-error.js';

export class QuantityParseError extends ClaimctlError {
  public static readonly FORMAT_WRONG = (raw: string): string =>
    `quantity '${raw}' must match the regular expression '^([+-]?[0-9.]+)([eEinumkKMGTP]*[-+]?[0-9]*)$'`;

  public static readonly SUFFIX_WRONG = (raw: string, suffix: string): string =>
    `unable to parse the suffix '${suffix}' of quantity '${raw}'`;

  /**
   * @param message - error message
   * @param raw - the literal that failed to parse
   */
  public constructor(
    message: string,
    public readonly raw: string,
  ) {
    super(message, undefined, {raw});
  }
}
