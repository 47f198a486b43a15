// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type ClaimRequest} from './claim-request.js';
import {ClaimSpec, type StorageResources} from './claim-spec.js';
import {Quantity} from '../quantity/quantity.js';
import {BuildError} from '../errors/build-error.js';
import {splitAccessModes} from './access-mode.js';

/**
 * Assembles a {@link ClaimSpec} from raw claim options.
 *
 * Access mode tokens are carried through verbatim; rejecting unknown modes is the job of the ClaimRequestValidator.
 */
@injectable()
export class ClaimBuilder {
  /**
   * @param request - raw claim options
   * @param enforceNamespace - when false the namespace is left empty and the server decides
   * @throws QuantityParseError if a quantity literal is malformed
   * @throws BuildError if the storage limit is not strictly greater than the storage request
   */
  public build(request: ClaimRequest, enforceNamespace: boolean): ClaimSpec {
    const requests: StorageResources = {storage: Quantity.parse(request.storageRequest)};

    let limits: StorageResources | undefined;
    if (request.storageLimit) {
      const limit = Quantity.parse(request.storageLimit);
      if (limit.compare(requests.storage) < 1) {
        throw new BuildError(BuildError.LIMIT_NOT_GREATER_THAN_REQUEST, {
          request: request.storageRequest,
          limit: request.storageLimit,
        });
      }
      limits = {storage: limit};
    }

    return ClaimSpec.of({
      name: request.name,
      namespace: enforceNamespace ? (request.namespace ?? '') : '',
      requests,
      limits,
      accessModes: request.accessModes ? splitAccessModes(request.accessModes) : undefined,
      storageClassName: request.storageClassName || undefined,
    });
  }
}
