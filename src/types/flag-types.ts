// SPDX-License-Identifier: Apache-2.0

export type FlagType = 'string' | 'boolean';

export interface CommandFlag {
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: boolean | string;
  alias?: string;
  type: FlagType;
}

export interface CommandFlags {
  required: CommandFlag[];
  optional: CommandFlag[];
}
