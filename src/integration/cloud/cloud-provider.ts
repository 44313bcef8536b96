// SPDX-License-Identifier: Apache-2.0

import {type Instances} from './resources/instance/instances.js';
import {type Disks} from './resources/disk/disks.js';
import {type Firewalls} from './resources/firewall/firewalls.js';
import {type SshKeys} from './resources/ssh-key/ssh-keys.js';
import {type ProviderName} from './provider-name.js';

/**
 * The cloud boundary. One provider instance is bound to one project and zone for the lifetime of a command.
 */
export interface CloudProvider {
  readonly name: ProviderName;
  readonly project: string;
  readonly zone: string;

  instances(): Instances;

  disks(): Disks;

  firewalls(): Firewalls;

  sshKeys(): SshKeys;
}

export interface CloudSettings {
  provider: ProviderName;
  project: string;
  zone: string;
  /** path of a service account key file; application default credentials are used when unset */
  credentials?: string;
}
