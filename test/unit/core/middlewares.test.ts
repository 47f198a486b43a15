// SPDX-License-Identifier: Apache-2.0

import 'sinon-chai';

import sinon, {type SinonStubbedInstance} from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, beforeEach} from 'mocha';
import {container} from 'tsyringe-neo';

import {Middlewares} from '../../../src/core/middlewares.js';
import {type ConfigManager} from '../../../src/core/config-manager.js';
import {ClaimctlWinstonLogger} from '../../../src/core/logging/claimctl-winston-logger.js';
import {InjectTokens} from '../../../src/core/dependency-injection/inject-tokens.js';
import {Flags as flags} from '../../../src/commands/flags.js';
import {Argv} from '../../helpers/argv-wrapper.js';
import {resetForTest} from '../../test-container.js';

describe('Middlewares', () => {
  let configManager: ConfigManager;
  let logger: SinonStubbedInstance<ClaimctlWinstonLogger>;
  let middlewares: Middlewares;

  beforeEach(() => {
    resetForTest();
    configManager = container.resolve<ConfigManager>(InjectTokens.ConfigManager);
    logger = sinon.createStubInstance(ClaimctlWinstonLogger);
    middlewares = new Middlewares(configManager, logger);
  });

  afterEach(() => sinon.restore());

  describe('setLoggerDevFlag', () => {
    it('should switch the logger to dev mode when --dev is set', () => {
      const argv = Argv.initializeEmpty();
      argv.setArg(flags.devMode, true);

      middlewares.setLoggerDevFlag()(argv.build());

      expect(logger.setDevMode).to.have.been.calledOnceWith(true);
    });

    it('should leave the logger alone without --dev', () => {
      middlewares.setLoggerDevFlag()(Argv.initializeEmpty().build());

      expect(logger.setDevMode).not.to.have.been.called;
    });
  });

  describe('processArguments', () => {
    it('should store the flags in the config manager', () => {
      const argv = Argv.initializeEmpty();
      argv.setCommand('create', 'persistentvolumeclaim');
      argv.setArg(flags.storageRequest, '1Gi');
      argv.setArg(flags.namespace, 'test-namespace');

      middlewares.processArguments()(argv.build());

      expect(configManager.getStringFlag(flags.storageRequest)).to.equal('1Gi');
      expect(configManager.getNamespaceFlag(flags.namespace)?.name).to.equal('test-namespace');
      expect(configManager.getStringFlag(flags.output)).to.equal('name');
      expect(logger.debug).to.have.been.calledWith(
        'Current Command: create persistentvolumeclaim --storage-request 1Gi --namespace test-namespace',
      );
    });

    it('should fill argv with default values', () => {
      const built = Argv.initializeEmpty().build();

      middlewares.processArguments()(built);

      expect(built[flags.dryRun.name]).to.equal('none');
      expect(built[flags.validate.name]).to.equal('strict');
    });

    it('should drop values of a previous invocation', () => {
      const previous = Argv.initializeEmpty();
      previous.setArg(flags.storageLimit, '2Gi');
      configManager.update(previous.build());

      middlewares.processArguments()(Argv.initializeEmpty().build());

      expect(configManager.getStringFlag(flags.storageLimit)).to.equal('');
    });
  });
});
