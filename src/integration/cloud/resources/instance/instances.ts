// SPDX-License-Identifier: Apache-2.0

import {type Instance, type InstanceSpec} from './instance.js';
import {type IP} from '../../../../types/aliases.js';

export interface Instances {
  /**
   * Read an instance by name
   * @returns the instance, or undefined when it does not exist
   * @throws CloudApiError for any other failure
   */
  read(name: string): Promise<Instance | undefined>;

  /**
   * Create an instance and wait for the operation to finish
   */
  create(spec: InstanceSpec): Promise<Instance>;

  /**
   * Add network tags to an instance, keeping the ones it already has
   */
  addTags(name: string, tags: string[]): Promise<void>;

  start(name: string): Promise<void>;

  /**
   * Give the primary network interface an external (one-to-one NAT) address
   */
  addExternalAccess(name: string): Promise<void>;

  /**
   * Attach an existing disk as a non-boot disk; the device name is the disk name
   */
  attachDisk(name: string, diskName: string): Promise<void>;

  /**
   * @returns the external IP of the primary network interface, or undefined while none is assigned
   */
  publicIp(name: string): Promise<IP | undefined>;

  /**
   * List instances carrying every one of the given labels
   */
  list(labels: Record<string, string>): Promise<Instance[]>;
}
