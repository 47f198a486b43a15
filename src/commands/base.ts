// SPDX-License-Identifier: Apache-2.0

import {inject} from 'tsyringe-neo';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type ClaimctlLogger} from '../core/logging/claimctl-logger.js';
import {type ConfigManager} from '../core/config-manager.js';
import {type CommandDefinition} from '../types/index.js';

export abstract class BaseCommand {
  public readonly logger: ClaimctlLogger;
  public readonly configManager: ConfigManager;

  protected constructor(
    @inject(InjectTokens.ClaimctlLogger) logger?: ClaimctlLogger,
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
  ) {
    this.logger = patchInject(logger, InjectTokens.ClaimctlLogger, this.constructor.name);
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
  }

  public abstract getCommandDefinition(): CommandDefinition;

  public abstract close(): Promise<void>;
}
