// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../commands/flags.js';
import {type ConfigManager} from './config-manager.js';
import {type ClaimctlLogger} from './logging/claimctl-logger.js';
import {type ArgvStruct} from '../types/aliases.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';

export type Middleware = (argv: ArgvStruct) => void;

@injectable()
export class Middlewares {
  private readonly configManager: ConfigManager;
  private readonly logger: ClaimctlLogger;

  public constructor(
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
    @inject(InjectTokens.ClaimctlLogger) logger?: ClaimctlLogger,
  ) {
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ClaimctlLogger, this.constructor.name);
  }

  public setLoggerDevFlag(): Middleware {
    const logger = this.logger;

    /**
     * @param argv - yargs Argv
     */
    return (argv: ArgvStruct): void => {
      if (argv[flags.devMode.name] === true) {
        logger.debug('Setting logger dev flag');
        logger.setDevMode(true);
      }
    };
  }

  /**
   * Processes the Argv and stores the flag values in the config manager
   *
   * @returns callback function to be executed from yargs
   */
  public processArguments(): Middleware {
    const configManager = this.configManager;
    const logger = this.logger;

    /**
     * @param argv - yargs Argv
     */
    return (argv: ArgvStruct): void => {
      logger.debug('Processing arguments');

      configManager.reset();

      // fill in default values of the flags not passed
      configManager.applyPrecedence(argv);

      // update config manager
      configManager.update(argv);

      const currentCommand: string = argv._.join(' ');
      const commandArguments: string = flags.stringifyArgv(argv);
      logger.debug(`Current Command: ${(currentCommand + ' ' + commandArguments).trim()}`);
      logger.debug(`Version: ${configManager.getVersion()}`);
    };
  }
}
