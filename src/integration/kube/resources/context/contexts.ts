// SPDX-License-Identifier: Apache-2.0

import {type NamespaceName} from '../namespace/namespace-name.js';

export interface Contexts {
  /**
   * Read the current context in the kubeconfig
   * @returns the current context name
   */
  readCurrent(): string;

  /**
   * Read the namespace of the current context, `default` when the context names none
   */
  readCurrentNamespace(): NamespaceName;
}
