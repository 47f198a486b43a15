// SPDX-License-Identifier: Apache-2.0

import {type FieldValidation} from '../../../../core/validation-directive.js';

export interface PvcCreateOptions {
  /** submit with `dryRun=All`, nothing is persisted */
  readonly dryRun: boolean;
  readonly fieldManager?: string;
  readonly fieldValidation?: FieldValidation;
}
