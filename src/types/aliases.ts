// SPDX-License-Identifier: Apache-2.0

import {type ClaimctlListrTaskWrapper} from './index.js';

export type ArgvStruct = {_: (string | number)[]} & Record<string, unknown>;

export type ConfigBuilder<Context, Config> = (
  argv: ArgvStruct,
  context_: Context,
  task: ClaimctlListrTaskWrapper<Context>,
) => Promise<Config>;
