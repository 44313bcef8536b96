// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';

@Exclude()
export class DeployedStateMetadata {
  @Expose()
  public project: string;

  @Expose()
  public zone: string;

  @Expose({name: 'generated_at'})
  public generatedAt: string;

  @Expose()
  public version: number;

  public constructor(project?: string, zone?: string, generatedAt?: string, version?: number) {
    this.project = project ?? '';
    this.zone = zone ?? '';
    this.generatedAt = generatedAt ?? new Date(0).toISOString();
    this.version = version ?? 0;
  }
}
