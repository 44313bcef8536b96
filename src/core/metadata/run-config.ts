// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
  validateSync,
} from 'class-validator';
import {PortMapping} from './port-mapping.js';
import {NodeKind} from './node-kind.js';
import {IsStringRecord} from '../validator-decorators.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {describeValidationErrors} from '../util/validation-helpers.js';
import {type Validate} from '../../types/index.js';

export type NetworkMode = 'host' | 'bridge';

/**
 * Runtime settings shared by every node of one team and kind. `image`, `data_dir` and `cmd` are required; the other
 * keys fall back to the defaults assigned here.
 */
@Exclude()
export class RunConfig implements Validate {
  public static readonly REQUIRED_KEYS: readonly string[] = ['image', 'data_dir', 'cmd'];

  @Expose()
  @IsString()
  @IsNotEmpty()
  public image: string = '';

  @Expose({name: 'data_dir'})
  @IsString()
  @IsNotEmpty()
  public dataDir: string = '';

  @Expose()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({each: true})
  public cmd: string[] = [];

  @Expose({name: 'db_disk_gb'})
  @IsInt()
  @Min(10)
  public dbDiskGb: number = 50;

  @Expose({name: 'p2p_identity_path'})
  @IsString()
  @IsNotEmpty()
  public p2pIdentityPath: string = '/identity.json';

  @Expose()
  @IsStringRecord()
  public env: Record<string, string> = {};

  @Expose()
  @IsArray()
  @ValidateNested({each: true})
  @Type(() => PortMapping)
  public ports: PortMapping[] = [];

  @Expose({name: 'persistent_disk'})
  @IsOptional()
  @IsBoolean()
  public persistentDisk?: boolean;

  @Expose({name: 'network_mode'})
  @IsOptional()
  @IsIn(['host', 'bridge'])
  public networkMode?: NetworkMode;

  /** Validators get a data disk unless they opt out; boot nodes only when they opt in */
  public usesPersistentDisk(kind: NodeKind): boolean {
    return this.persistentDisk ?? kind === NodeKind.Validator;
  }

  public effectiveNetworkMode(): NetworkMode {
    return this.networkMode ?? (this.ports.length === 0 ? 'host' : 'bridge');
  }

  public validate(): void {
    const violations = describeValidationErrors(validateSync(this));
    if (violations.length > 0) {
      throw new ConfigurationError(`invalid run config: ${violations.join('; ')}`, undefined, {violations});
    }
  }
}
