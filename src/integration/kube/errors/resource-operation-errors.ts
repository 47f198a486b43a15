// SPDX-License-Identifier: Apache-2.0

import {ClaimctlError} from '../../../core/errors/claimctl-error.js';
import {type ResourceOperation} from '../resources/resource-operation.js';
import {type ResourceType} from '../resources/resource-type.js';
import {type NamespaceName} from '../resources/namespace/namespace-name.js';

export class ResourceOperationError extends ClaimctlError {
  /**
   * Instantiates a new error with a message and an optional cause.
   * @param operation - the operation that failed.
   * @param resourceType - the type of resource that failed.
   * @param namespace - the namespace of the resource.
   * @param name - the name of the resource.
   * @param cause - optional underlying cause of the error.
   */
  public constructor(
    operation: ResourceOperation,
    resourceType: ResourceType,
    namespace: NamespaceName,
    name: string,
    cause?: unknown,
  ) {
    super(`failed to ${operation} ${resourceType} '${name}' in namespace '${namespace.name}'`, cause, {
      operation,
      resourceType,
      namespace: namespace.name,
      name,
    });
  }
}

export class ResourceNotFoundError extends ResourceOperationError {}
