// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import {type ClaimctlLogger} from './core/logging/claimctl-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type Middlewares} from './core/middlewares.js';
import {ClaimctlError} from './core/errors/claimctl-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getClaimctlVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: ClaimctlLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    throw new ClaimctlError('Error initializing container', error);
  }

  const logger = container.resolve<ClaimctlLogger>(InjectTokens.ClaimctlLogger);

  if (context) {
    // save the logger so that claimctl.ts can use it to report completion
    context.logger = logger;
  }

  logger.debug('Initializing claimctl CLI');
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getClaimctlVersion()));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing middlewares');
  const middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('claimctl')
    .usage('Usage:\n  claimctl <command> [options]')
    .alias('h', 'help')
    .version(false)
    .strict()
    .demandCommand(1, 'Select a command')
    .middleware(
      [middlewares.setLoggerDevFlag(), middlewares.processArguments()],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

  for (const definition of commands.Initialize()) {
    rootCmd.command(definition.command, definition.desc, definition.builder);
  }

  rootCmd.fail((message, error) => {
    if (message) {
      if (message.includes('Unknown argument')) {
        logger.showUser(message);
        rootCmd.showHelp();
      } else {
        logger.showUserError(new ClaimctlError(`Error running claimctl CLI, failure occurred: ${message}`));
      }
      process.exitCode = 1;
    } else if (error) {
      logger.debug(`command failed: ${error.message}`);
    }
  });

  logger.debug('Setting up flags');
  // set root level flags
  flags.setOptionalCommandFlags(rootCmd, flags.devMode);
  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parse();
}
