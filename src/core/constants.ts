// SPDX-License-Identifier: Apache-2.0

import {PRESET_TIMER} from 'listr2';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- claimctl related constants ---------------------------------------------------------------
export const CLAIMCTL_HOME_DIR = process.env.CLAIMCTL_HOME || PathEx.join(process.env.HOME ?? '', '.claimctl');
export const CLAIMCTL_LOG_FILE = 'claimctl.log';
export const CLAIMCTL_LOG_LEVEL = process.env.CLAIMCTL_LOG_LEVEL || 'debug';

// -------------------- create command defaults -------------------------------------------------------------------
export const DEFAULT_FIELD_MANAGER = 'claimctl-create';

export const LISTR_DEFAULT_RENDERER_OPTION = {
  collapseSubtasks: false,
  timer: PRESET_TIMER,
};
