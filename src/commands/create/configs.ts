// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../flags.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ConfigManager} from '../../core/config-manager.js';
import {type ClaimctlLogger} from '../../core/logging/claimctl-logger.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {toDryRunStrategy} from '../../core/dry-run-strategy.js';
import {toOutputFormat} from '../../core/output/output-format.js';
import {toFieldValidation} from '../../core/validation-directive.js';
import * as constants from '../../core/constants.js';
import {type CreatePvcContext} from './config-interfaces/create-pvc-context.js';
import {type CreatePvcConfigClass} from './config-interfaces/create-pvc-config-class.js';

@injectable()
export class CreateCommandConfigs {
  private readonly configManager: ConfigManager;
  private readonly logger: ClaimctlLogger;

  public constructor(
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
    @inject(InjectTokens.ClaimctlLogger) logger?: ClaimctlLogger,
  ) {
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ClaimctlLogger, this.constructor.name);
  }

  public async createConfigBuilder(argv: ArgvStruct, context_: CreatePvcContext): Promise<CreatePvcConfigClass> {
    this.configManager.update(argv);

    const name = argv.name === undefined || argv.name === null ? '' : String(argv.name);

    context_.config = {
      name,
      namespace: this.configManager.getNamespaceFlag(flags.namespace),
      context: this.configManager.getStringFlag(flags.context) ?? '',
      storageRequest: this.configManager.getStringFlag(flags.storageRequest) ?? '',
      storageLimit: this.configManager.getStringFlag(flags.storageLimit) ?? '',
      accessModes: this.configManager.getStringFlag(flags.accessModes) ?? '',
      storageClassName: this.configManager.getStringFlag(flags.storageClassName) ?? '',
      dryRun: toDryRunStrategy(this.configManager.getStringFlag(flags.dryRun)),
      output: toOutputFormat(this.configManager.getStringFlag(flags.output)),
      saveConfig: this.configManager.getBooleanFlag(flags.saveConfig),
      fieldManager: this.configManager.getStringFlag(flags.fieldManager) || constants.DEFAULT_FIELD_MANAGER,
      validate: toFieldValidation(this.configManager.getStringFlag(flags.validate)),
      devMode: this.configManager.getBooleanFlag(flags.devMode),
      quiet: this.configManager.getBooleanFlag(flags.quiet),
    };

    this.logger.debug(
      `create persistentvolumeclaim '${name}': dryRun=${context_.config.dryRun}, output=${context_.config.output}, ` +
        `namespace=${context_.config.namespace?.name ?? '<from kube context>'}`,
    );

    return context_.config;
  }
}
