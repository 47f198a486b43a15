// SPDX-License-Identifier: Apache-2.0

import 'sinon-chai';

import sinon, {type SinonStubbedInstance} from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, beforeEach} from 'mocha';

import {ErrorHandler} from '../../../src/core/error-handler.js';
import {ClaimctlWinstonLogger} from '../../../src/core/logging/claimctl-winston-logger.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {SilentBreak} from '../../../src/core/errors/silent-break.js';
import {ClaimctlError} from '../../../src/core/errors/claimctl-error.js';

describe('ErrorHandler', () => {
  let logger: SinonStubbedInstance<ClaimctlWinstonLogger>;
  let errorHandler: ErrorHandler;

  beforeEach(() => {
    logger = sinon.createStubInstance(ClaimctlWinstonLogger);
    errorHandler = new ErrorHandler(logger);
  });

  afterEach(() => {
    process.exitCode = undefined;
    sinon.restore();
  });

  it('should show a user break to the user without failing', () => {
    errorHandler.handle(new UserBreak('0.1.0'));

    expect(logger.showUser).to.have.been.calledOnceWith('0.1.0');
    expect(logger.showUserError).not.to.have.been.called;
    expect(process.exitCode).to.be.undefined;
  });

  it('should find a user break in the cause chain', () => {
    errorHandler.handle(new ClaimctlError('wrapped', new UserBreak('stopped by user')));

    expect(logger.showUser).to.have.been.calledOnceWith('stopped by user');
  });

  it('should log a silent break', () => {
    errorHandler.handle(new SilentBreak('nothing to do'));

    expect(logger.info).to.have.been.calledOnceWith('nothing to do');
    expect(logger.showUser).not.to.have.been.called;
    expect(process.exitCode).to.be.undefined;
  });

  it('should show any other error and set a failing exit code', () => {
    const error = new ClaimctlError('create persistentvolumeclaim: name must be specified');

    errorHandler.handle(error);

    expect(logger.showUserError).to.have.been.calledOnceWith(error);
    expect(process.exitCode).to.equal(1);
  });
});
