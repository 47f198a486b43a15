// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {container} from 'tsyringe-neo';

import {ConfigManager} from '../../../src/core/config-manager.js';
import {Flags as flags} from '../../../src/commands/flags.js';
import {InjectTokens} from '../../../src/core/dependency-injection/inject-tokens.js';
import {NamespaceName} from '../../../src/integration/kube/resources/namespace/namespace-name.js';
import {NamespaceNameInvalidError} from '../../../src/integration/kube/errors/namespace-name-invalid-error.js';
import {ClaimctlError} from '../../../src/core/errors/claimctl-error.js';
import {Argv} from '../../helpers/argv-wrapper.js';
import {resetForTest} from '../../test-container.js';

describe('ConfigManager', () => {
  let cm: ConfigManager;

  beforeEach(() => {
    resetForTest();
    cm = container.resolve<ConfigManager>(InjectTokens.ConfigManager);
  });

  describe('update values using argv', () => {
    it('should update string flag value', () => {
      const argv = Argv.initializeEmpty();
      argv.setArg(flags.storageRequest, '1Gi');

      cm.update(argv.build());
      expect(cm.getFlag(flags.storageRequest)).to.equal('1Gi');
      expect(cm.getStringFlag(flags.storageRequest)).to.equal('1Gi');

      // ensure non-string values are converted to string
      cm.reset();
      argv.setArg(flags.storageClassName, true);
      cm.update(argv.build());
      expect(cm.getFlag(flags.storageClassName)).to.equal('true');
    });

    it('should update boolean flag value', () => {
      // boolean values should work
      const argv = Argv.initializeEmpty();
      argv.setArg(flags.devMode, true);
      cm.update(argv.build());
      expect(cm.getFlag(flags.devMode)).to.equal(true);

      // ensure string "false" is converted to boolean
      cm.reset();
      argv.setArg(flags.devMode, 'false');
      cm.update(argv.build());
      expect(cm.getFlag(flags.devMode)).to.equal(false);

      // ensure string "true" is converted to boolean
      cm.reset();
      argv.setArg(flags.devMode, 'true');
      cm.update(argv.build());
      expect(cm.getBooleanFlag(flags.devMode)).to.equal(true);
    });

    it('should store the namespace as a NamespaceName', () => {
      const argv = Argv.initializeEmpty();
      argv.setArg(flags.namespace, 'test-namespace');

      cm.update(argv.build());

      const namespace = cm.getNamespaceFlag(flags.namespace);
      expect(namespace).to.be.instanceOf(NamespaceName);
      expect(namespace?.name).to.equal('test-namespace');
    });

    it('should reject a namespace that is not a DNS label', () => {
      const argv = Argv.initializeEmpty();
      argv.setArg(flags.namespace, 'Not_A_Label');

      expect(() => cm.update(argv.build())).to.throw(NamespaceNameInvalidError);
    });

    it('should ignore flags without a value', () => {
      cm.update(Argv.initializeEmpty().build());

      expect(cm.getFlag(flags.storageRequest)).to.be.undefined;
      expect(cm.getStringFlag(flags.storageRequest)).to.be.undefined;
      expect(cm.getBooleanFlag(flags.saveConfig)).to.be.false;
      expect(cm.getNamespaceFlag(flags.namespace)).to.be.undefined;
    });
  });

  describe('applyPrecedence', () => {
    it('should keep argv values', () => {
      const argv = Argv.initializeEmpty();
      argv.setArg(flags.output, 'json');

      const result = cm.applyPrecedence(argv.build());

      expect(result[flags.output.name]).to.equal('json');
    });

    it('should fall back to the default value', () => {
      const result = cm.applyPrecedence(Argv.initializeEmpty().build());

      expect(result[flags.output.name]).to.equal('name');
      expect(result[flags.dryRun.name]).to.equal('none');
      expect(result[flags.fieldManager.name]).to.equal('claimctl-create');
      expect(result[flags.saveConfig.name]).to.equal(false);
      expect(result).not.to.have.property(flags.namespace.name);
    });
  });

  describe('flag accessors', () => {
    it('should refuse to read a boolean flag as a string', () => {
      const argv = Argv.initializeEmpty();
      argv.setArg(flags.saveConfig, true);
      cm.update(argv.build());

      expect(() => cm.getStringFlag(flags.saveConfig))
        .to.throw(ClaimctlError)
        .with.property('message', "flag 'save-config' does not hold a string value");
    });

    it('should report the package version', () => {
      expect(cm.getVersion()).to.be.a('string').and.not.be.empty;
    });
  });
});
