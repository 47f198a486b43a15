// SPDX-License-Identifier: Apache-2.0

import {type V1PersistentVolumeClaim} from '@kubernetes/client-node';
import {type CreatePvcConfigClass} from './create-pvc-config-class.js';
import {type ClaimSpec} from '../../../business/claim/claim-spec.js';

export interface CreatePvcContext {
  config: CreatePvcConfigClass;
  claim?: ClaimSpec;
  manifest?: V1PersistentVolumeClaim;
  submitted?: V1PersistentVolumeClaim;
}
