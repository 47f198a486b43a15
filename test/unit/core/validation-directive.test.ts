// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {FieldValidation, toFieldValidation} from '../../../src/core/validation-directive.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';

describe('FieldValidation', () => {
  it('should default to strict', () => {
    expect(toFieldValidation(undefined)).to.equal(FieldValidation.STRICT);
  });

  it('should map the flag values to field validation directives', () => {
    expect(toFieldValidation('strict')).to.equal(FieldValidation.STRICT);
    expect(toFieldValidation('true')).to.equal(FieldValidation.STRICT);
    expect(toFieldValidation(true)).to.equal(FieldValidation.STRICT);
    expect(toFieldValidation('warn')).to.equal(FieldValidation.WARN);
    expect(toFieldValidation('ignore')).to.equal(FieldValidation.IGNORE);
    expect(toFieldValidation('false')).to.equal(FieldValidation.IGNORE);
    expect(toFieldValidation(false)).to.equal(FieldValidation.IGNORE);
    expect(toFieldValidation('Strict')).to.equal(FieldValidation.STRICT);
  });

  it('should reject any other value', () => {
    expect(() => toFieldValidation('loose'))
      .to.throw(IllegalArgumentError)
      .with.property(
        'message',
        'invalid - validate option "loose"; must be one of: strict (or true), warn, ignore (or false)',
      );
  });
});
