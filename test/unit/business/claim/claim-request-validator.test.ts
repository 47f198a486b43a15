// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {ClaimRequestValidator} from '../../../../src/business/claim/claim-request-validator.js';
import {ValidationError} from '../../../../src/business/errors/validation-error.js';
import {claimRequest} from '../../../test-utility.js';

describe('ClaimRequestValidator', () => {
  const validator = new ClaimRequestValidator();

  it('should accept a request with only a name and a storage request', () => {
    expect(() => validator.validate(claimRequest())).not.to.throw();
  });

  it('should require a name', () => {
    expect(() => validator.validate(claimRequest({name: ''})))
      .to.throw(ValidationError)
      .with.property('message', 'name must be specified');
  });

  it('should require a storage request', () => {
    expect(() => validator.validate(claimRequest({storageRequest: ''})))
      .to.throw(ValidationError)
      .with.property('message', 'storage-request must be specified');
  });

  it('should report the missing name before the missing storage request', () => {
    expect(() => validator.validate(claimRequest({name: '', storageRequest: ''}))).to.throw(
      ValidationError,
      'name must be specified',
    );
  });

  it('should accept every known access mode, in any order and repeated', () => {
    for (const accessModes of [
      'ReadWriteOnce',
      'ReadOnlyMany',
      'ReadWriteMany',
      'ReadWriteMany,ReadOnlyMany,ReadWriteOnce',
      'ReadWriteOnce,ReadWriteOnce',
    ]) {
      expect(() => validator.validate(claimRequest({accessModes}))).not.to.throw();
    }
  });

  it('should reject the first unknown access mode', () => {
    expect(() => validator.validate(claimRequest({accessModes: 'ReadWriteOnce,WriteOnly,Bogus'})))
      .to.throw(ValidationError)
      .with.property('message', 'provided access mode WriteOnly is invalid');
  });

  it('should reject ReadWriteBoth', () => {
    expect(() => validator.validate(claimRequest({accessModes: 'ReadWriteBoth'})))
      .to.throw(ValidationError)
      .with.property('message', 'provided access mode ReadWriteBoth is invalid');
  });

  it('should reject access modes with the wrong case', () => {
    expect(() => validator.validate(claimRequest({accessModes: 'readwriteonce'})))
      .to.throw(ValidationError)
      .with.property('message', 'provided access mode readwriteonce is invalid');
  });

  it('should reject an empty token between separators', () => {
    expect(() => validator.validate(claimRequest({accessModes: 'ReadWriteOnce,,ReadOnlyMany'})))
      .to.throw(ValidationError)
      .with.property('message', 'provided access mode  is invalid');
  });

  it('should not parse the quantities', () => {
    expect(() => validator.validate(claimRequest({storageRequest: 'lots', storageLimit: 'more'}))).not.to.throw();
  });
});
