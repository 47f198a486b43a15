// SPDX-License-Identifier: Apache-2.0

import {type Pvcs} from '../../../resources/pvc/pvcs.js';
import {type NamespaceName} from '../../../resources/namespace/namespace-name.js';
import {type CoreV1Api, type V1PersistentVolumeClaim} from '@kubernetes/client-node';
import {type IncomingMessage} from 'node:http';
import {ClaimctlError} from '../../../../../core/errors/claimctl-error.js';
import {KubeApiResponse} from '../../../kube-api-response.js';
import {ResourceOperation} from '../../../resources/resource-operation.js';
import {ResourceType} from '../../../resources/resource-type.js';
import {type PvcCreateOptions} from '../../../resources/pvc/pvc-create-options.js';

export class K8ClientPvcs implements Pvcs {
  public static readonly DRY_RUN_ALL = 'All';

  public constructor(private readonly kubeClient: CoreV1Api) {}

  public async create(
    namespace: NamespaceName,
    manifest: V1PersistentVolumeClaim,
    options: PvcCreateOptions,
  ): Promise<V1PersistentVolumeClaim> {
    const name = manifest.metadata?.name ?? '';

    let result: {response: IncomingMessage; body: V1PersistentVolumeClaim};
    try {
      result = await this.kubeClient.createNamespacedPersistentVolumeClaim(
        namespace.name,
        manifest,
        undefined,
        options.dryRun ? K8ClientPvcs.DRY_RUN_ALL : undefined,
        options.fieldManager || undefined,
        options.fieldValidation,
      );
    } catch (error) {
      throw new ClaimctlError(`failed to create persistentVolumeClaim ${K8ClientPvcs.describe(error)}`, error);
    }

    KubeApiResponse.check(
      result.response,
      ResourceOperation.CREATE,
      ResourceType.PERSISTENT_VOLUME_CLAIM,
      namespace,
      name,
    );

    if (!result.body) {
      throw new ClaimctlError(`failed to create persistentVolumeClaim ${name}: empty response body`);
    }

    return result.body;
  }

  /**
   * The client rejects with an HttpError whose body carries the API server's Status message.
   */
  private static describe(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'body' in error) {
      const body = error.body;
      if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
        return body.message;
      }
    }
    return error instanceof Error ? error.message : String(error);
  }
}
