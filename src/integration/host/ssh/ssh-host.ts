// SPDX-License-Identifier: Apache-2.0

import Docker from 'dockerode';
import {type Host, type HostContainers, type HostDisks, type HostFiles} from '../host.js';
import {type SshSession} from './ssh-session.js';
import {SshHostFiles} from './ssh-host-files.js';
import {SshHostDisks} from './ssh-host-disks.js';
import {DockerHostContainers} from '../docker/docker-host-containers.js';
import {type NetLogger} from '../../../core/logging/net-logger.js';
import {type IP} from '../../../types/aliases.js';
import * as constants from '../../../core/constants.js';

export class SshHost implements Host {
  private readonly hostFiles: HostFiles;
  private readonly hostDisks: HostDisks;
  private readonly hostContainers: HostContainers;

  public constructor(
    private readonly session: SshSession,
    user: string,
    privateKey: string,
    logger: NetLogger,
  ) {
    this.hostFiles = new SshHostFiles(session);
    this.hostDisks = new SshHostDisks(session, user, logger);
    this.hostContainers = new DockerHostContainers(
      session,
      user,
      () =>
        new Docker({
          protocol: 'ssh',
          host: session.ip,
          port: constants.SSH_PORT,
          username: user,
          sshOptions: {privateKey},
        }),
      logger,
    );
  }

  public get ip(): IP {
    return this.session.ip;
  }

  public files(): HostFiles {
    return this.hostFiles;
  }

  public disks(): HostDisks {
    return this.hostDisks;
  }

  public containers(): HostContainers {
    return this.hostContainers;
  }

  public async close(): Promise<void> {
    await this.session.close();
  }
}
