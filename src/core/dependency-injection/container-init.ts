// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type ClaimctlLogger} from '../logging/claimctl-logger.js';
import {ClaimctlWinstonLogger} from '../logging/claimctl-winston-logger.js';
import * as constants from '../constants.js';
import {ConfigManager} from '../config-manager.js';
import {InjectTokens} from './inject-tokens.js';
import {K8ClientFactory} from '../../integration/kube/k8-client/k8-client-factory.js';
import {ClaimRequestValidator} from '../../business/claim/claim-request-validator.js';
import {ClaimBuilder} from '../../business/claim/claim-builder.js';
import {ResourcePrinter} from '../output/resource-printer.js';
import {CreateCommandHandlers} from '../../commands/create/handlers.js';
import {CreateCommandTasks} from '../../commands/create/tasks.js';
import {CreateCommandConfigs} from '../../commands/create/configs.js';
import {ErrorHandler} from '../error-handler.js';
import {Middlewares} from '../middlewares.js';
import {PathEx} from '../../business/utils/path-ex.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param homeDirectory - the home directory to use, defaults to constants.CLAIMCTL_HOME_DIR
   * @param logLevel - the log level to use, defaults to constants.CLAIMCTL_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    homeDirectory: string = constants.CLAIMCTL_HOME_DIR,
    logLevel: string = constants.CLAIMCTL_LOG_LEVEL,
    developmentMode: boolean = false,
    testLogger?: ClaimctlLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<ClaimctlLogger>(InjectTokens.ClaimctlLogger).debug('Container already initialized');
      return;
    }

    // ClaimctlLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.LogDirectory, {useValue: PathEx.join(homeDirectory, 'logs')});
    if (testLogger) {
      container.registerInstance(InjectTokens.ClaimctlLogger, testLogger);
      container.resolve<ClaimctlLogger>(InjectTokens.ClaimctlLogger).debug('Using test logger');
    } else {
      container.register(
        InjectTokens.ClaimctlLogger,
        {useClass: ClaimctlWinstonLogger},
        {lifecycle: Lifecycle.Singleton},
      );
      container.resolve<ClaimctlLogger>(InjectTokens.ClaimctlLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ConfigManager, {useClass: ConfigManager}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.K8Factory, {useClass: K8ClientFactory}, {lifecycle: Lifecycle.Singleton});

    // Claim construction
    container.register(
      InjectTokens.ClaimRequestValidator,
      {useClass: ClaimRequestValidator},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.ClaimBuilder, {useClass: ClaimBuilder}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ResourcePrinter, {useClass: ResourcePrinter}, {lifecycle: Lifecycle.Singleton});

    // Commands
    container.register(
      InjectTokens.CreateCommandConfigs,
      {useClass: CreateCommandConfigs},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.CreateCommandTasks,
      {useClass: CreateCommandTasks},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.CreateCommandHandlers,
      {useClass: CreateCommandHandlers},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Middlewares, {useClass: Middlewares}, {lifecycle: Lifecycle.Singleton});

    container.resolve<ClaimctlLogger>(InjectTokens.ClaimctlLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param homeDirectory - the home directory to use, defaults to constants.CLAIMCTL_HOME_DIR
   * @param logLevel - the log level to use, defaults to constants.CLAIMCTL_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(homeDirectory?: string, logLevel?: string, developmentMode?: boolean, testLogger?: ClaimctlLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<ClaimctlLogger>(InjectTokens.ClaimctlLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(homeDirectory, logLevel, developmentMode, testLogger);
  }
}
