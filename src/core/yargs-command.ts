// SPDX-License-Identifier: Apache-2.0

import {type ArgumentsCamelCase, type Argv, type CommandModule} from 'yargs';
import {Flags as commandFlags} from '../commands/flags.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {ClaimctlError} from './errors/claimctl-error.js';
import {type BaseCommand} from '../commands/base.js';
import {type CommandFlags} from '../types/flag-types.js';

export type CommandHandlerFunction = (argv: ArgumentsCamelCase) => Promise<boolean>;

export interface YargsCommandOptions {
  command: string;
  description: string;
  aliases?: string[];
  commandDef: BaseCommand;
  handler: CommandHandlerFunction;
}

export class YargsCommand implements CommandModule {
  public readonly command: string;
  public readonly describe: string;
  public readonly aliases: string[];
  public readonly builder: (y: Argv) => Argv;
  public readonly handler: (argv: ArgumentsCamelCase) => Promise<void>;

  public constructor(options: YargsCommandOptions, flags: CommandFlags) {
    const {command, description, aliases = [], commandDef, handler} = options;
    const {required, optional} = flags;

    if (!command) {
      throw new IllegalArgumentError("A string is required as the 'command' property", command);
    }
    if (!description) {
      throw new IllegalArgumentError("A string is required as the 'description' property", description);
    }
    if (!required) {
      throw new IllegalArgumentError("An array of CommandFlag is required as the 'required' property", required);
    }
    if (!optional) {
      throw new IllegalArgumentError("An array of CommandFlag is required as the 'optional' property", optional);
    }

    const commandNamespace = commandDef.getCommandDefinition().command;
    const commandName = command.split(' ')[0];

    this.command = command;
    this.describe = description;
    this.aliases = aliases;
    this.builder = (y: Argv): Argv => {
      commandFlags.setRequiredCommandFlags(y, ...required);
      commandFlags.setOptionalCommandFlags(y, ...optional);
      return y;
    };
    this.handler = async (argv: ArgumentsCamelCase): Promise<void> => {
      commandDef.logger.info(`==== Running '${commandNamespace} ${commandName}' ===`);
      commandDef.logger.info(commandFlags.stringifyArgv(argv));
      const result = await handler(argv);
      commandDef.logger.info(`==== Finished running '${commandNamespace} ${commandName}' ====`);
      if (!result) {
        throw new ClaimctlError(`${commandNamespace} ${commandName} failed, expected returned value to be true`);
      }
    };
  }
}
