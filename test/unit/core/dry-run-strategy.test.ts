// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {DryRunStrategy, toDryRunStrategy} from '../../../src/core/dry-run-strategy.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';

describe('DryRunStrategy', () => {
  it('should default to none', () => {
    expect(toDryRunStrategy(undefined)).to.equal(DryRunStrategy.NONE);
  });

  it('should map the known strategies', () => {
    expect(toDryRunStrategy('none')).to.equal(DryRunStrategy.NONE);
    expect(toDryRunStrategy('client')).to.equal(DryRunStrategy.CLIENT);
    expect(toDryRunStrategy('server')).to.equal(DryRunStrategy.SERVER);
  });

  it('should reject any other value', () => {
    expect(() => toDryRunStrategy('true'))
      .to.throw(IllegalArgumentError)
      .with.property('message', 'Invalid dry-run value (true). Must be "none", "server", or "client".');
  });
});
