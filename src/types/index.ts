// SPDX-License-Identifier: Apache-2.0

import {
  type DefaultRenderer,
  type ListrTask,
  type ListrTaskWrapper,
  type SimpleRenderer,
} from 'listr2';
import {type Argv} from 'yargs';

// NOTE: DO NOT add any claimctl imports in this file to avoid circular dependencies

/**
 * Generic type for representing optional types
 */
export type Optional<T> = T | undefined;

export type ClaimctlListrTask<T> = ListrTask<T, typeof DefaultRenderer, typeof SimpleRenderer>;

export type ClaimctlListrTaskWrapper<T> = ListrTaskWrapper<T, typeof DefaultRenderer, typeof SimpleRenderer>;

export interface CommandDefinition {
  command: string;
  desc: string;
  builder: (yargs: Argv) => Argv;
}
