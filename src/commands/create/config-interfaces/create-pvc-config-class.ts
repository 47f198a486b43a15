// SPDX-License-Identifier: Apache-2.0

import {type NamespaceName} from '../../../integration/kube/resources/namespace/namespace-name.js';
import {type DryRunStrategy} from '../../../core/dry-run-strategy.js';
import {type OutputFormat} from '../../../core/output/output-format.js';
import {type FieldValidation} from '../../../core/validation-directive.js';

export interface CreatePvcConfigClass {
  name: string;
  /** set only when --namespace was given, the claim is then pinned to it */
  namespace?: NamespaceName;
  context: string;
  storageRequest: string;
  storageLimit: string;
  accessModes: string;
  storageClassName: string;
  dryRun: DryRunStrategy;
  output: OutputFormat;
  saveConfig: boolean;
  fieldManager: string;
  validate: FieldValidation;
  devMode: boolean;
  quiet: boolean;
}
