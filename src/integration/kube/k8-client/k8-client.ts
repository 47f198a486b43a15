// SPDX-License-Identifier: Apache-2.0

import * as k8s from '@kubernetes/client-node';
import {ClaimctlError} from '../../../core/errors/claimctl-error.js';
import {type K8} from '../k8.js';
import {type Contexts} from '../resources/context/contexts.js';
import {K8ClientContexts} from './resources/context/k8-client-contexts.js';
import {type Pvcs} from '../resources/pvc/pvcs.js';
import {K8ClientPvcs} from './resources/pvc/k8-client-pvcs.js';

/**
 * A kubernetes API wrapper class providing the functionality required by claimctl
 */
export class K8Client implements K8 {
  private readonly k8Contexts: Contexts;
  private readonly k8Pvcs: Pvcs;

  /**
   * Create a new k8Factory client for the given context, if context is undefined it will use the current context in kubeconfig
   * @param context - The context to create the k8Factory client for
   * @param kubeConfig - an already loaded kubeconfig, loaded from the default locations when omitted
   */
  public constructor(context?: string, kubeConfig?: k8s.KubeConfig) {
    const config = kubeConfig ?? K8Client.loadKubeConfig();
    K8Client.selectContext(config, context);

    if (!config.getCurrentContext()) {
      throw new ClaimctlError('No active kubernetes context found. ' + 'Please set current kubernetes context.');
    }

    if (!config.getCurrentCluster()) {
      throw new ClaimctlError('No active kubernetes cluster found. ' + 'Please create a cluster and set current context.');
    }

    this.k8Contexts = new K8ClientContexts(config);
    this.k8Pvcs = new K8ClientPvcs(config.makeApiClient(k8s.CoreV1Api));
  }

  private static loadKubeConfig(): k8s.KubeConfig {
    const kubeConfig = new k8s.KubeConfig();
    kubeConfig.loadFromDefault();
    return kubeConfig;
  }

  private static selectContext(kubeConfig: k8s.KubeConfig, context?: string): void {
    if (!context) {
      return;
    }

    if (!kubeConfig.getContextObject(context)) {
      throw new ClaimctlError(`No kube config context found with name ${context}`);
    }

    kubeConfig.setCurrentContext(context);
  }

  public contexts(): Contexts {
    return this.k8Contexts;
  }

  public pvcs(): Pvcs {
    return this.k8Pvcs;
  }
}
