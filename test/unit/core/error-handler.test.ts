// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import {ErrorHandler} from '../../../src/core/error-handler.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {StageFailureError} from '../../../src/core/errors/stage-failure-error.js';
import {DeployNetError} from '../../../src/core/errors/deploy-net-error.js';
import {RecordingLogger} from '../../test-utility.js';

describe('ErrorHandler', () => {
  let logger: RecordingLogger;
  let handler: ErrorHandler;
  let exitCode: typeof process.exitCode;

  beforeEach(() => {
    exitCode = process.exitCode;
    process.exitCode = undefined;
    logger = new RecordingLogger();
    handler = new ErrorHandler(logger);
  });

  afterEach(() => {
    process.exitCode = exitCode;
  });

  it('shows a user break without failing the process', () => {
    handler.handle(new DeployNetError('wrapped', new UserBreak('1.2.3')));

    expect(logger.messages('user')).to.deep.equal(['1.2.3']);
    expect(process.exitCode).to.be.undefined;
  });

  it('fails the process on a stage failure without showing the error again', () => {
    handler.handle(new StageFailureError('infra', ['val-one']));

    expect(logger.messages('error')).to.deep.equal(['infra failed for 1 target(s): val-one']);
    expect(process.exitCode).to.equal(1);
  });

  it('shows any other error and fails the process', () => {
    handler.handle(new Error('no such directory'));

    expect(logger.messages('error')).to.deep.equal(['no such directory']);
    expect(process.exitCode).to.equal(1);
  });
});
