// SPDX-License-Identifier: Apache-2.0

import {type IP} from '../../../../types/aliases.js';

/** Lifecycle states reported for a VM; providers map their own vocabulary onto these */
export enum InstanceStatus {
  Provisioning = 'PROVISIONING',
  Staging = 'STAGING',
  Running = 'RUNNING',
  Stopping = 'STOPPING',
  Stopped = 'STOPPED',
  Suspended = 'SUSPENDED',
  Terminated = 'TERMINATED',
  Unknown = 'UNKNOWN',
}

export interface Instance {
  readonly name: string;
  readonly status: InstanceStatus;
  readonly tags: readonly string[];
  readonly labels: Readonly<Record<string, string>>;
  /** names of the disks attached to the instance, boot disk included */
  readonly attachedDisks: readonly string[];
  /** true when the primary network interface has a one-to-one NAT access config */
  readonly hasExternalAccess: boolean;
  readonly publicIp?: IP;
}

export interface InstanceSpec {
  name: string;
  machineType: string;
  sourceImage: string;
  bootDiskGb: number;
  tags: string[];
  labels: Record<string, string>;
}
