// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../flags.js';
import {type CommandFlags} from '../../types/flag-types.js';

export const CREATE_PVC_FLAGS: CommandFlags = {
  required: [],
  optional: [
    flags.accessModes,
    flags.context,
    flags.devMode,
    flags.dryRun,
    flags.fieldManager,
    flags.namespace,
    flags.output,
    flags.quiet,
    flags.saveConfig,
    flags.storageClassName,
    flags.storageLimit,
    flags.storageRequest,
    flags.validate,
  ],
};
