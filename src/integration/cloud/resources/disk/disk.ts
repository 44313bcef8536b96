// SPDX-License-Identifier: Apache-2.0

export interface Disk {
  readonly name: string;
  readonly sizeGb: number;
  /** names of the instances the disk is attached to */
  readonly users: readonly string[];
}

export interface DiskSpec {
  name: string;
  sizeGb: number;
  diskType: string;
  labels: Record<string, string>;
}
