// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {type V1PersistentVolumeClaim} from '@kubernetes/client-node';
import {InjectTokens} from '../src/core/dependency-injection/inject-tokens.js';
import {type ClaimctlLogger} from '../src/core/logging/claimctl-logger.js';
import {type ClaimRequest} from '../src/business/claim/claim-request.js';

export const TEST_PVC_NAME = 'test-pvc';
export const TEST_NAMESPACE = 'test-namespace';

export function getTestLogger(): ClaimctlLogger {
  return container.resolve<ClaimctlLogger>(InjectTokens.ClaimctlLogger);
}

/**
 * Claim options for `test-pvc` with a 1Gi storage request, overridable per test
 */
export function claimRequest(overrides: Partial<ClaimRequest> = {}): ClaimRequest {
  return {
    name: TEST_PVC_NAME,
    namespace: TEST_NAMESPACE,
    storageRequest: '1Gi',
    ...overrides,
  };
}

export function pvcManifest(name: string = TEST_PVC_NAME, storage: string = '1Gi'): V1PersistentVolumeClaim {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {name},
    spec: {resources: {requests: {storage}}},
  };
}
