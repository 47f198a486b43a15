// SPDX-License-Identifier: Apache-2.0

import {type Contexts} from '../../../resources/context/contexts.js';
import {type KubeConfig} from '@kubernetes/client-node';
import {NamespaceName} from '../../../resources/namespace/namespace-name.js';

export class K8ClientContexts implements Contexts {
  public constructor(private readonly kubeConfig: KubeConfig) {}

  public readCurrent(): string {
    return this.kubeConfig.getCurrentContext();
  }

  public readCurrentNamespace(): NamespaceName {
    return NamespaceName.of(this.kubeConfig.getContextObject(this.readCurrent())?.namespace || NamespaceName.DEFAULT);
  }
}
