// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {CommandHandler} from '../../core/command-handler.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import * as constants from '../../core/constants.js';
import {type ClaimctlLogger} from '../../core/logging/claimctl-logger.js';
import {ResourcePrinter} from '../../core/output/resource-printer.js';
import {OutputFormat} from '../../core/output/output-format.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {Flags as flags} from '../flags.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type CreateCommandTasks} from './tasks.js';
import {type CreateCommandConfigs} from './configs.js';
import {type CreatePvcContext} from './config-interfaces/create-pvc-context.js';

@injectable()
export class CreateCommandHandlers extends CommandHandler {
  public static readonly PVC_COMMAND = 'create persistentvolumeclaim';

  private readonly tasks: CreateCommandTasks;
  private readonly configs: CreateCommandConfigs;
  private readonly printer: ResourcePrinter;

  public constructor(
    @inject(InjectTokens.ClaimctlLogger) logger?: ClaimctlLogger,
    @inject(InjectTokens.CreateCommandTasks) tasks?: CreateCommandTasks,
    @inject(InjectTokens.CreateCommandConfigs) configs?: CreateCommandConfigs,
    @inject(InjectTokens.ResourcePrinter) printer?: ResourcePrinter,
  ) {
    super(logger);

    this.tasks = patchInject(tasks, InjectTokens.CreateCommandTasks, this.constructor.name);
    this.configs = patchInject(configs, InjectTokens.CreateCommandConfigs, this.constructor.name);
    this.printer = patchInject(printer, InjectTokens.ResourcePrinter, this.constructor.name);
  }

  /**
   * - Read the flags and decide whether the namespace is pinned.
   * - Validate the raw options, then build the claim.
   * - Submit it unless this is a client side dry-run.
   * - Print the claim in the requested output format.
   */
  public async persistentVolumeClaim(argv: ArgvStruct): Promise<boolean> {
    const context_ = await this.commandAction<CreatePvcContext>(
      argv,
      [
        this.tasks.initialize(argv, this.configs.createConfigBuilder.bind(this.configs)),
        this.tasks.validateOptions(),
        this.tasks.buildClaim(),
        this.tasks.submitClaim(),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
        silentRendererCondition: CreateCommandHandlers.isSilent(argv),
      },
      CreateCommandHandlers.PVC_COMMAND,
    );

    const manifest = context_.submitted ?? context_.manifest;
    if (!manifest) {
      throw new MissingArgumentError('no persistent volume claim to print');
    }

    this.logger.showUser(
      this.printer.print(manifest, context_.config.output, ResourcePrinter.operation(context_.config.dryRun)),
    );

    return true;
  }

  /**
   * Task progress is not rendered in quiet mode or when the claim itself is written to stdout as json or yaml.
   */
  private static isSilent(argv: ArgvStruct): boolean {
    const output = argv[flags.output.name];
    return argv[flags.quiet.name] === true || (output !== undefined && output !== '' && output !== OutputFormat.NAME);
  }
}
