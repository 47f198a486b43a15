// SPDX-License-Identifier: Apache-2.0

import {type V1PersistentVolumeClaim} from '@kubernetes/client-node';
import {type NamespaceName} from '../namespace/namespace-name.js';
import {type PvcCreateOptions} from './pvc-create-options.js';

export interface Pvcs {
  /**
   * Create a persistent volume claim
   * @param namespace - the namespace to create the persistent volume claim in
   * @param manifest - the persistent volume claim to submit
   * @param options - dry-run and field handling options
   * @returns the persistent volume claim as returned by the API server
   * @throws {ClaimctlError} if the persistent volume claim could not be created
   */
  create(
    namespace: NamespaceName,
    manifest: V1PersistentVolumeClaim,
    options: PvcCreateOptions,
  ): Promise<V1PersistentVolumeClaim>;
}
