// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {Flags as flags} from '../../../src/commands/flags.js';
import {Argv} from '../../helpers/argv-wrapper.js';

describe('Flags', () => {
  describe('stringifyArgv', () => {
    it('should render flags that differ from their default value', () => {
      const argv = Argv.getDefaultArgv('test-pvc');
      argv.setArg(flags.storageRequest, '1Gi');
      argv.setArg(flags.saveConfig, true);
      argv.setArg(flags.output, 'json');

      expect(flags.stringifyArgv(argv.build())).to.equal('--output json --save-config --storage-request 1Gi');
    });

    it('should render nothing for default values', () => {
      expect(flags.stringifyArgv(Argv.getDefaultArgv('test-pvc').build())).to.equal('');
    });
  });

  it('should list every flag once by name', () => {
    const names = flags.allFlags.map(flag => flag.name);

    expect(new Set(names).size).to.equal(names.length);
    expect(flags.allFlagsMap.get('storage-request')).to.equal(flags.storageRequest);
  });
});
