// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Listr, type ListrBaseClassOptions} from 'listr2';
import {type ClaimctlLogger} from './logging/claimctl-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {ClaimctlError} from './errors/claimctl-error.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type ClaimctlListrTask} from '../types/index.js';

@injectable()
export class CommandHandler {
  public readonly logger: ClaimctlLogger;

  public constructor(@inject(InjectTokens.ClaimctlLogger) logger?: ClaimctlLogger) {
    this.logger = patchInject(logger, InjectTokens.ClaimctlLogger, this.constructor.name);
  }

  public async commandAction<T extends object>(
    argv: ArgvStruct,
    actionTasks: ClaimctlListrTask<T>[],
    options: ListrBaseClassOptions<T>,
    errorString: string,
  ): Promise<T> {
    this.logger.debug(`running '${errorString}' with ${actionTasks.length} tasks`, {command: argv._});
    const tasks = new Listr<T>([...actionTasks], options);
    try {
      return await tasks.run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ClaimctlError(`${errorString}: ${message}`, error);
    }
  }
}
