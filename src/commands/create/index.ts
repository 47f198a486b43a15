// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type Argv} from 'yargs';
import * as CreateFlags from './flags.js';
import {YargsCommand} from '../../core/yargs-command.js';
import {BaseCommand} from '../base.js';
import {type CreateCommandHandlers} from './handlers.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type ClaimctlLogger} from '../../core/logging/claimctl-logger.js';
import {type ConfigManager} from '../../core/config-manager.js';
import {type CommandDefinition} from '../../types/index.js';

/**
 * Defines the core functionalities of 'create' command
 */
@injectable()
export class CreateCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'create';

  public readonly handlers: CreateCommandHandlers;

  public constructor(
    @inject(InjectTokens.ClaimctlLogger) logger?: ClaimctlLogger,
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
    @inject(InjectTokens.CreateCommandHandlers) handlers?: CreateCommandHandlers,
  ) {
    super(logger, configManager);

    this.handlers = patchInject(handlers, InjectTokens.CreateCommandHandlers, this.constructor.name);
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: CreateCommand.COMMAND_NAME,
      desc: 'Create a resource from command line options',
      builder: (yargs: Argv): Argv => {
        return yargs
          .command(
            new YargsCommand(
              {
                command: 'persistentvolumeclaim [name]',
                aliases: ['pvc'],
                description: 'Create a persistent volume claim with the specified name',
                commandDef: this,
                handler: argv => this.handlers.persistentVolumeClaim(argv),
              },
              CreateFlags.CREATE_PVC_FLAGS,
            ),
          )
          .demandCommand(1, 'Select a create command');
      },
    };
  }

  public async close(): Promise<void> {
    // no-op
    return Promise.resolve();
  }
}
