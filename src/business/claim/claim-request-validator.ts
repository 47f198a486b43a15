// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type ClaimRequest} from './claim-request.js';
import {ValidationError} from '../errors/validation-error.js';
import {ACCESS_MODES, isAccessMode, splitAccessModes} from './access-mode.js';

/**
 * Checks the shape of the raw claim options before anything is parsed. Quantities are left to the ClaimBuilder.
 */
@injectable()
export class ClaimRequestValidator {
  public static readonly NAME_REQUIRED = 'name must be specified';
  public static readonly STORAGE_REQUEST_REQUIRED = 'storage-request must be specified';
  public static readonly ACCESS_MODE_INVALID = (accessMode: string): string =>
    `provided access mode ${accessMode} is invalid`;

  /**
   * @throws ValidationError for the first rule that fails
   */
  public validate(request: ClaimRequest): void {
    if (!request.name) {
      throw new ValidationError(ClaimRequestValidator.NAME_REQUIRED);
    }

    if (!request.storageRequest) {
      throw new ValidationError(ClaimRequestValidator.STORAGE_REQUEST_REQUIRED);
    }

    if (request.accessModes) {
      for (const accessMode of splitAccessModes(request.accessModes)) {
        if (!isAccessMode(accessMode)) {
          throw new ValidationError(ClaimRequestValidator.ACCESS_MODE_INVALID(accessMode), {
            accessMode,
            allowed: ACCESS_MODES,
          });
        }
      }
    }
  }
}
