// SPDX-License-Identifier: Apache-2.0

import {type Disk, type DiskSpec} from './disk.js';

export interface Disks {
  /**
   * @returns the disk, or undefined when it does not exist
   */
  read(name: string): Promise<Disk | undefined>;

  create(spec: DiskSpec): Promise<Disk>;
}
