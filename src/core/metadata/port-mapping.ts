// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {IsIn, IsInt, Max, Min} from 'class-validator';

@Exclude()
export class PortMapping {
  @Expose()
  @IsInt()
  @Min(1)
  @Max(65_535)
  public host: number;

  @Expose()
  @IsInt()
  @Min(1)
  @Max(65_535)
  public container: number;

  @Expose()
  @IsIn(['tcp', 'udp'])
  public protocol: 'tcp' | 'udp';

  public constructor(host?: number, container?: number, protocol?: 'tcp' | 'udp') {
    this.host = host ?? 0;
    this.container = container ?? 0;
    this.protocol = protocol ?? 'tcp';
  }

  /** Docker's `<port>/<protocol>` notation */
  public get containerPortKey(): string {
    return `${this.container}/${this.protocol}`;
  }
}
