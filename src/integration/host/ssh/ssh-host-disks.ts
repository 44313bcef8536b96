// SPDX-License-Identifier: Apache-2.0

import {type HostDisks} from '../host.js';
import {type SshSession} from './ssh-session.js';
import {quote} from './shell.js';
import {type NetLogger} from '../../../core/logging/net-logger.js';
import {pollWithBackoff, RetryExhaustedError, type RetryPolicy} from '../../../core/util/retry.js';
import {DeploymentError} from '../../../core/errors/deployment-error.js';
import * as constants from '../../../core/constants.js';

const DEVICE_POLICY: RetryPolicy = {maxAttempts: 10, baseDelayMs: 1000, maxDelayMs: 8000};

/** `blkid` exit status when the device holds no recognizable filesystem */
const BLKID_NOTHING_FOUND = 2;

export class SshHostDisks implements HostDisks {
  public constructor(
    private readonly session: SshSession,
    private readonly user: string,
    private readonly logger: NetLogger,
  ) {}

  public async mount(diskName: string, mountPoint: string): Promise<void> {
    const device = `${constants.DISK_DEVICE_PREFIX}${diskName}`;
    await this.waitForDevice(device);

    const probe = await this.session.exec(`sudo blkid ${quote(device)}`);
    if (probe.code === BLKID_NOTHING_FOUND) {
      this.logger.info(`Formatting blank disk ${diskName} on ${this.session.ip}`);
      await this.session.run(
        `sudo mkfs.ext4 -m 0 -E lazy_itable_init=0,lazy_journal_init=0,discard ${quote(device)}`,
      );
    } else if (probe.code !== 0) {
      throw new DeploymentError(`unable to probe ${device} on ${this.session.ip}: ${probe.stderr.trim()}`);
    }

    await this.session.run(`sudo mkdir -p ${quote(mountPoint)}`);
    await this.session.run(
      `mountpoint -q ${quote(mountPoint)} || sudo mount -o discard,defaults ${quote(device)} ${quote(mountPoint)}`,
    );
    await this.session.run(`sudo chown ${quote(this.user)}: ${quote(mountPoint)}`);
  }

  private async waitForDevice(device: string): Promise<void> {
    try {
      await pollWithBackoff<undefined>(DEVICE_POLICY, async () => {
        const result = await this.session.exec(`test -e ${quote(device)}`);
        return result.code === 0 ? {done: true, value: undefined} : {done: false, reason: `${device} not present`};
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new DeploymentError(`disk device ${device} did not appear on ${this.session.ip}`, error);
      }
      throw error;
    }
  }
}
