// SPDX-License-Identifier: Apache-2.0

import type Docker from 'dockerode';
import {type ContainerCreateOptions} from 'dockerode';
import {StatusCodes} from 'http-status-codes';
import {type HostContainers} from '../host.js';
import {type ContainerSpec} from '../container-spec.js';
import {type SshSession} from '../ssh/ssh-session.js';
import {quote} from '../ssh/shell.js';
import {type NetLogger} from '../../../core/logging/net-logger.js';
import {DeployNetError} from '../../../core/errors/deploy-net-error.js';
import {DeploymentError} from '../../../core/errors/deployment-error.js';

const STOP_TIMEOUT_SECONDS = 30;

/**
 * Containers of one VM. The runtime is installed over the SSH session; everything else goes through the Docker API,
 * tunnelled over its own SSH connection.
 */
export class DockerHostContainers implements HostContainers {
  private docker?: Docker;

  public constructor(
    private readonly session: SshSession,
    private readonly user: string,
    private readonly connectDocker: () => Docker,
    private readonly logger: NetLogger,
  ) {}

  public async ensureRuntime(): Promise<void> {
    const probe = await this.session.exec('command -v docker');
    if (probe.code !== 0) {
      this.logger.info(`Installing docker on ${this.session.ip}`);
      await this.session.run(
        'sudo apt-get update -q && sudo DEBIAN_FRONTEND=noninteractive apt-get install -y -q docker.io',
      );
    }
    await this.session.run(`id -nG ${quote(this.user)} | grep -qw docker || sudo usermod -aG docker ${quote(this.user)}`);
    await this.session.run('sudo systemctl enable --now docker');
  }

  public async pull(image: string): Promise<void> {
    const docker = this.client();
    this.logger.debug(`Pulling image '${image}' on ${this.session.ip}`);

    try {
      const stream: NodeJS.ReadableStream = await docker.pull(image);
      await new Promise<void>((resolve, reject) => {
        docker.modem.followProgress(
          stream,
          (error: unknown) => {
            if (error) {
              reject(error);
            } else {
              resolve();
            }
          },
          (event: {status?: string; id?: string}) => {
            if (event.status) {
              this.logger.debug(event.id ? `${event.id}: ${event.status}` : event.status);
            }
          },
        );
      });
    } catch (error) {
      throw new DeploymentError(`failed to pull image '${image}' on ${this.session.ip}`, error, {image});
    }
  }

  public async replace(spec: ContainerSpec): Promise<string> {
    await this.remove(spec.name);

    const docker = this.client();
    const bridged = spec.networkMode === 'bridge';
    const portKeys = spec.ports.map(port => `${port.container}/${port.protocol}`);
    const options: ContainerCreateOptions = {
      name: spec.name,
      Image: spec.image,
      Cmd: spec.cmd,
      Env: Object.entries(spec.env).map(([key, value]) => `${key}=${value}`),
      Labels: spec.labels,
      ExposedPorts: bridged ? Object.fromEntries(portKeys.map(key => [key, {}])) : undefined,
      HostConfig: {
        Binds: spec.binds,
        NetworkMode: spec.networkMode,
        RestartPolicy: {Name: spec.restartPolicy},
        PortBindings: bridged
          ? Object.fromEntries(spec.ports.map((port, index) => [portKeys[index], [{HostPort: `${port.host}`}]]))
          : undefined,
      },
    };

    try {
      const container = await docker.createContainer(options);
      await container.start();
      this.logger.debug(`Started container ${spec.name} (${container.id.slice(0, 12)}) on ${this.session.ip}`);
      return container.id;
    } catch (error) {
      throw new DeploymentError(`failed to start container '${spec.name}' on ${this.session.ip}`, error, {
        image: spec.image,
      });
    }
  }

  public async remove(name: string): Promise<boolean> {
    const container = this.client().getContainer(name);

    try {
      await container.stop({t: STOP_TIMEOUT_SECONDS});
    } catch (error) {
      const statusCode = DeployNetError.statusCodeOf(error);
      if (statusCode === StatusCodes.NOT_FOUND) {
        return false;
      } else if (statusCode === StatusCodes.NOT_MODIFIED) {
        this.logger.debug(`Container ${name} already stopped on ${this.session.ip}`);
      } else if (statusCode === StatusCodes.CONFLICT) {
        this.logger.warn(`Container ${name} stop conflict on ${this.session.ip} (likely removing)`);
      } else {
        throw new DeploymentError(`failed to stop container '${name}' on ${this.session.ip}`, error);
      }
    }

    try {
      await container.remove({force: true});
    } catch (error) {
      const statusCode = DeployNetError.statusCodeOf(error);
      if (statusCode === StatusCodes.NOT_FOUND) {
        this.logger.debug(`Container ${name} already removed on ${this.session.ip}`);
      } else if (statusCode === StatusCodes.CONFLICT) {
        this.logger.warn(`Container ${name} removal conflict on ${this.session.ip} (likely removing)`);
      } else {
        throw new DeploymentError(`failed to remove container '${name}' on ${this.session.ip}`, error);
      }
    }
    return true;
  }

  private client(): Docker {
    this.docker ??= this.connectDocker();
    return this.docker;
  }
}
