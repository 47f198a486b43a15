// SPDX-License-Identifier: Apache-2.0

import 'sinon-chai';

import {type SinonSpy} from 'sinon';
import sinon from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, beforeEach} from 'mocha';

import winston from 'winston';
import {type ClaimctlLogger} from '../../../src/core/logging/claimctl-logger.js';
import {ClaimctlWinstonLogger} from '../../../src/core/logging/claimctl-winston-logger.js';

describe('Logging', () => {
  let logger: ClaimctlLogger;
  let loggerSpy: SinonSpy;

  beforeEach(() => {
    logger = new ClaimctlWinstonLogger('debug', false, 'test/data/tmp/logs');
    loggerSpy = sinon.spy(winston.Logger.prototype, 'log');
  });

  // Cleanup after each test
  afterEach(() => sinon.restore());

  it('should log at correct severity', () => {
    expect(logger).to.be.instanceof(ClaimctlWinstonLogger);
    const meta = logger.prepMeta();

    logger.error('Error log');
    expect(loggerSpy).to.have.been.calledWith('error', 'Error log', meta);

    logger.warn('Warn log');
    expect(loggerSpy).to.have.been.calledWith('warn', 'Warn log', meta);

    logger.info('Info log');
    expect(loggerSpy).to.have.been.calledWith('info', 'Info log', meta);

    logger.debug('Debug log');
    expect(loggerSpy).to.have.been.calledWith('debug', 'Debug log', meta);
  });

  it('should tag messages with a new trace id', () => {
    const before = logger.prepMeta().traceId;
    logger.nextTraceId();

    expect(logger.prepMeta().traceId).to.be.a('string').and.not.equal(before);
  });

  it('should print the error chain to the console', () => {
    const consoleStub = sinon.stub(console, 'log');

    logger.showUserError(new Error('outer failure', {cause: new Error('inner failure')}));

    const lines = consoleStub.getCalls().map(call => String(call.args[0]));
    consoleStub.restore();
    expect(lines).to.have.lengthOf(3);
    expect(lines[1]).to.contain('outer failure');
    expect(loggerSpy).to.have.been.calledWith('error', 'outer failure');
  });
});
