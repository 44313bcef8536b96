// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {type Host, type HostFactory, type HostSettings} from '../host.js';
import {SshSession} from './ssh-session.js';
import {SshHost} from './ssh-host.js';
import {type NetLogger} from '../../../core/logging/net-logger.js';
import {pollWithBackoff, RetryExhaustedError, type RetryPolicy} from '../../../core/util/retry.js';
import {DeployNetError} from '../../../core/errors/deploy-net-error.js';
import {DeploymentError} from '../../../core/errors/deployment-error.js';
import {ConfigurationError} from '../../../core/errors/configuration-error.js';
import {PathEx} from '../../../core/util/path-ex.js';
import {type IP} from '../../../types/aliases.js';
import * as constants from '../../../core/constants.js';

const SSH_READY_POLICY: RetryPolicy = {
  maxAttempts: constants.SSH_READY_MAX_ATTEMPTS,
  baseDelayMs: constants.SSH_READY_DELAY_MS,
  maxDelayMs: constants.SSH_READY_DELAY_MS,
};

/**
 * Opens SSH sessions to freshly provisioned VMs, retrying while sshd comes up and the project key propagates.
 */
export class SshHostFactory implements HostFactory {
  private readonly privateKey: string;

  public constructor(
    private readonly settings: HostSettings,
    private readonly logger: NetLogger,
  ) {
    const keyFile = PathEx.resolve(settings.privateKeyPath);
    if (!fs.existsSync(keyFile)) {
      throw new ConfigurationError(`ssh private key not found: ${keyFile}`);
    }
    this.privateKey = fs.readFileSync(keyFile, 'utf8');
  }

  public async connect(ip: IP): Promise<Host> {
    try {
      const session = await pollWithBackoff<SshSession>(SSH_READY_POLICY, async attempt => {
        try {
          return {done: true, value: await SshSession.open(ip, this.settings.user, this.privateKey, this.logger)};
        } catch (error) {
          const reason = DeployNetError.messageOf(error);
          this.logger.debug(`ssh to ${ip} not ready (attempt ${attempt}): ${reason}`);
          return {done: false, reason};
        }
      });
      return new SshHost(session, this.settings.user, this.privateKey, this.logger);
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new DeploymentError(`host ${ip} did not accept ssh sessions as ${this.settings.user}`, error);
      }
      throw error;
    }
  }
}
