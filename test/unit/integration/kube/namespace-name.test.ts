// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {NamespaceName} from '../../../../src/integration/kube/resources/namespace/namespace-name.js';
import {NamespaceNameInvalidError} from '../../../../src/integration/kube/errors/namespace-name-invalid-error.js';

describe('NamespaceName', () => {
  it('should accept a DNS-1123 label', () => {
    const namespace = NamespaceName.of('test-namespace');

    expect(namespace.name).to.equal('test-namespace');
    expect(`${namespace}`).to.equal('test-namespace');
  });

  for (const invalid of ['', 'Test', 'test_namespace', '-test', 'test-', 'a'.repeat(64)]) {
    it(`should reject '${invalid.length > 10 ? invalid.slice(0, 10) + '...' : invalid}'`, () => {
      expect(() => NamespaceName.of(invalid))
        .to.throw(NamespaceNameInvalidError)
        .with.property('message', NamespaceNameInvalidError.NAMESPACE_NAME_INVALID(invalid));
    });
  }

  it('should compare by name', () => {
    expect(NamespaceName.of('test-namespace').equals(NamespaceName.of('test-namespace'))).to.be.true;
    expect(NamespaceName.of('test-namespace').equals(NamespaceName.of('default'))).to.be.false;
  });
});
