// SPDX-License-Identifier: Apache-2.0

import {type Contexts} from './resources/context/contexts.js';
import {type Pvcs} from './resources/pvc/pvcs.js';

export interface K8 {
  /**
   * Fluent accessor for reading and manipulating contexts in the kubeconfig.
   */
  contexts(): Contexts;

  /**
   * Fluent accessor for reading and manipulating persistent volume claims in the kubernetes cluster.
   */
  pvcs(): Pvcs;
}
