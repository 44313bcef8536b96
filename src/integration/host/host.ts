// SPDX-License-Identifier: Apache-2.0

import {type ContainerSpec} from './container-spec.js';
import {type IP} from '../../types/aliases.js';

export interface HostFiles {
  /** Absolute home directory of the session user */
  home(): Promise<string>;

  ensureDirectory(remotePath: string): Promise<void>;

  /**
   * Copy a local file to the host, creating the parent directory
   * @param mode - permission bits of the remote file
   */
  upload(localPath: string, remotePath: string, mode?: number): Promise<void>;
}

export interface HostDisks {
  /**
   * Wait for the attached disk's device, format it when it holds no filesystem and mount it. Mounting an already
   * mounted disk is a no-op; existing contents are never touched.
   */
  mount(diskName: string, mountPoint: string): Promise<void>;
}

export interface HostContainers {
  /** Install the container runtime when the host has none */
  ensureRuntime(): Promise<void>;

  pull(image: string): Promise<void>;

  /**
   * Stop and remove any container named `spec.name`, then create and start a new one
   * @returns the id of the started container
   */
  replace(spec: ContainerSpec): Promise<string>;

  /** @returns false when no container with that name existed */
  remove(name: string): Promise<boolean>;
}

/** A live session to one VM; callers must `close()` it */
export interface Host {
  readonly ip: IP;

  files(): HostFiles;

  disks(): HostDisks;

  containers(): HostContainers;

  close(): Promise<void>;
}

export interface HostFactory {
  /** Connect to the VM, waiting for it to accept sessions */
  connect(ip: IP): Promise<Host>;
}

export interface HostSettings {
  user: string;
  privateKeyPath: string;
}
