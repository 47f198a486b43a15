// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../../src/commands/flags.js';
import {type CommandFlag} from '../../src/types/flag-types.js';
import {type ArgvStruct} from '../../src/types/aliases.js';

export class Argv {
  private args: Record<string, unknown> = {};
  private positionals: Record<string, string> = {};

  private command?: string;
  private subcommand?: string;

  private constructor() {}

  public setArg(flag: CommandFlag, value: unknown): void {
    this.args[flag.name] = value;
  }

  public getArg(flag: CommandFlag): unknown {
    return this.args[flag.name];
  }

  public setPositional(name: string, value: string): void {
    this.positionals[name] = value;
  }

  public setCommand(command: string, subcommand?: string): void {
    this.command = command;
    this.subcommand = subcommand;
  }

  public build(): ArgvStruct {
    const _: string[] = [];
    if (this.command) {
      _.push(this.command);
    }
    if (this.subcommand) {
      _.push(...this.subcommand.split(' '));
    }

    return {...structuredClone(this.args), ...this.positionals, _};
  }

  public static initializeEmpty(): Argv {
    return new Argv();
  }

  /**
   * Arguments of `create persistentvolumeclaim <name>` with every optional flag at its default value
   */
  public static getDefaultArgv(name: string): Argv {
    const argv = new Argv();
    for (const flag of flags.allFlags) {
      if (flag.definition.defaultValue !== undefined) {
        argv.setArg(flag, flag.definition.defaultValue);
      }
    }
    argv.setCommand('create', 'persistentvolumeclaim');
    argv.setPositional('name', name);
    return argv;
  }
}
